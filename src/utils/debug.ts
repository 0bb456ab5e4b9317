export type DebugLogger = (...args: unknown[]) => void;

const ENV_FLAG = 'PAGEFLOW_DEBUG';

export function isDebugEnabled(): boolean {
  if (Reflect.get(globalThis, '__PAGEFLOW_DEBUG__') === true) return true;
  if (typeof process !== 'undefined') {
    const flag = process.env[ENV_FLAG];
    if (flag === '1' || flag === 'true') return true;
  }
  return false;
}

export function createDebugLogger(scope: string): DebugLogger {
  return (...args: unknown[]) => {
    if (!isDebugEnabled()) return;
    console.log(scope, ...args);
  };
}
