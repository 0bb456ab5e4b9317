import { readFileSync } from 'fs';
import type { FontMetricsRecord } from '../types/fonts.js';

const DB_URL = new URL('./data/font-metrics.json', import.meta.url);

function isRecordObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function parseWidths(value: unknown): Record<string, number> | undefined {
  if (!isRecordObject(value)) return undefined;
  const out: Record<string, number> = {};
  for (const [ch, w] of Object.entries(value)) {
    if (isFiniteNumber(w) && w > 0) out[ch] = w;
  }
  return out;
}

function parseCategory(value: unknown): FontMetricsRecord['category'] {
  if (value === 'serif' || value === 'monospace') return value;
  return 'sans-serif';
}

export function parseFontMetricsRecord(value: unknown): FontMetricsRecord | null {
  if (!isRecordObject(value)) return null;
  const { id, family, aliases, metrics } = value;
  if (typeof id !== 'string' || typeof family !== 'string' || !isRecordObject(metrics)) return null;

  const { ascent, descent, lineGap, averageWidth, unitsPerEm } = metrics;
  if (!isFiniteNumber(ascent) || !isFiniteNumber(descent) || !isFiniteNumber(averageWidth)) return null;

  return {
    id,
    family,
    aliases: Array.isArray(aliases) ? aliases.filter((a): a is string => typeof a === 'string') : [],
    category: parseCategory(value.category),
    metrics: {
      ascent,
      descent,
      lineGap: isFiniteNumber(lineGap) ? lineGap : 0,
      averageWidth,
      unitsPerEm: isFiniteNumber(unitsPerEm) && unitsPerEm > 0 ? unitsPerEm : 1000
    },
    spaceWidth: isFiniteNumber(value.spaceWidth) ? value.spaceWidth : undefined,
    averageCharWidth: isFiniteNumber(value.averageCharWidth) ? value.averageCharWidth : undefined,
    charWidthOverrides: parseWidths(value.charWidthOverrides)
  };
}

let _builtIn: FontMetricsRecord[] | null = null;

export function getBuiltInFontMetricsDb(): FontMetricsRecord[] {
  if (_builtIn) return _builtIn;

  const raw: unknown = JSON.parse(readFileSync(DB_URL, 'utf8'));
  if (!Array.isArray(raw)) {
    throw new Error(`Font metrics database at ${DB_URL.pathname} is not an array`);
  }

  const records: FontMetricsRecord[] = [];
  for (const entry of raw) {
    const record = parseFontMetricsRecord(entry);
    if (record) records.push(record);
  }

  _builtIn = records;
  return records;
}
