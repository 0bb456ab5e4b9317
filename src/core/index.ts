export * from './config.js';
export * from './errors.js';
export { LayoutEngine } from './layout-engine.js';
export { layoutDocument, collectPages } from './layout-document.js';
export { Page } from './page.js';
export { iterateWords } from './words.js';
export * from './justify.js';
export { StyleState } from './style-state.js';
export { TagNesting } from './tag-nesting.js';
export * from './tags.js';
export * from './token-source.js';
