// src/utils/canonicalizer.ts
//
// 目的:
// - 入れ子の入力データから、キー順や浮動小数の誤差に左右されない正規形を作る。
// - 正規形の SHA-256 をフィンガープリントやキャッシュキーに使う。
// 前後関係:
// - service/fingerprint.ts から呼ばれる。ここでは入力のどの項目を対象にするかは決めない。
import { createHash } from 'node:crypto';
import type { JsonValue } from '@/model/calculation';

const FLOAT_PRECISION = 10;

const compareKeys = (a: string, b: string): number =>
  a < b ? -1 : a > b ? 1 : 0;

const normalizeNumber = (value: number): number => {
  if (Number.isNaN(value)) return 0;
  if (value === Infinity) return Number.MAX_VALUE;
  if (value === -Infinity) return -Number.MAX_VALUE;
  if (Number.isInteger(value)) return value;
  return Number(value.toFixed(FLOAT_PRECISION));
};

const normalizeEntries = (
  entries: Iterable<[string, unknown]>
): { [key: string]: JsonValue } => {
  const sorted = Array.from(entries).sort(([a], [b]) => compareKeys(a, b));
  const result: { [key: string]: JsonValue } = {};
  for (const [key, value] of sorted) {
    // JSON.stringify と同じく undefined のキーは落とす
    if (value === undefined) continue;
    result[key] = normalize(value);
  }
  return result;
};

export const normalize = (value: unknown): JsonValue => {
  if (value === null || value === undefined) return null;

  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return normalizeNumber(value);
  if (typeof value === 'bigint') return value.toString();
  if (typeof value === 'string') return value.trim();
  // function / symbol
  if (typeof value !== 'object') return null;

  if (Array.isArray(value)) {
    return value.map((item) => normalize(item));
  }
  if (value instanceof Map) {
    return normalizeEntries(
      Array.from(value.entries(), ([key, item]): [string, unknown] => [
        String(key),
        item,
      ])
    );
  }
  if (value instanceof Set) {
    return Array.from(value, (item) => normalize(item));
  }
  // Date などは toJSON() の結果を正規化する
  if ('toJSON' in value && typeof value.toJSON === 'function') {
    const json: unknown = value.toJSON();
    return normalize(json);
  }
  return normalizeEntries(Object.entries(value));
};

export const canonicalize = (data: unknown): string =>
  JSON.stringify(normalize(data));

export const generateHash = (data: unknown): string =>
  createHash('sha256').update(canonicalize(data), 'utf8').digest('hex');

export const areEqual = (a: unknown, b: unknown): boolean =>
  canonicalize(a) === canonicalize(b);
