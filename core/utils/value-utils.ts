import { isValueRecord } from '@core/types/value';
import type { Value } from '@core/types/value';

/**
 * Structural equality used for change detection between rounds.
 * NaN equals NaN so an unchanged NaN is not reported as a change.
 */
export function valuesEqual(a: Value | undefined, b: Value | undefined): boolean {
  if (a === b) {
    return true;
  }
  if (a === undefined || b === undefined || a === null || b === null) {
    return false;
  }
  if (typeof a === 'number' && typeof b === 'number') {
    return Number.isNaN(a) && Number.isNaN(b);
  }
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) {
      return false;
    }
    return a.every((item, index) => valuesEqual(item, b[index]));
  }
  if (isValueRecord(a) && isValueRecord(b)) {
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) {
      return false;
    }
    return keys.every(key => key in b && valuesEqual(a[key], b[key]));
  }
  return false;
}

/**
 * Renders a value for tables and log lines: lists as `[a, b]`, records as
 * JSON, everything else as its string form.
 */
export function formatValue(value: Value | undefined): string {
  if (value === undefined) {
    return '';
  }
  if (value === null) {
    return 'None';
  }
  if (typeof value === 'boolean') {
    return value ? 'True' : 'False';
  }
  if (Array.isArray(value)) {
    return `[${value.map(item => formatValue(item)).join(', ')}]`;
  }
  if (isValueRecord(value)) {
    return JSON.stringify(value);
  }
  return String(value);
}

function typeRank(value: Value): number {
  if (value === null) return 0;
  if (typeof value === 'boolean' || typeof value === 'number') return 1;
  if (typeof value === 'string') return 2;
  if (Array.isArray(value)) return 3;
  return 4;
}

/**
 * Total order over comparable values: numbers (and booleans) numerically,
 * strings by code unit, lists and records element by element. Values of
 * different kinds are not comparable.
 *
 * @throws {TypeError} When the two values cannot be ordered
 */
export function compareValues(a: Value, b: Value): number {
  const rankA = typeRank(a);
  const rankB = typeRank(b);
  if (rankA !== rankB) {
    throw new TypeError(`Cannot order ${describeValue(a)} and ${describeValue(b)}`);
  }

  if (rankA === 0 || a === null || b === null) {
    return 0;
  }
  if (rankA === 1) {
    return Number(a) - Number(b);
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (Array.isArray(a) && Array.isArray(b)) {
    const length = Math.min(a.length, b.length);
    for (let i = 0; i < length; i++) {
      const result = compareValues(a[i], b[i]);
      if (result !== 0) {
        return result;
      }
    }
    return a.length - b.length;
  }
  if (isValueRecord(a) && isValueRecord(b)) {
    const keys = Object.keys(a);
    return compareValues(keys.map(key => a[key]), keys.map(key => b[key] ?? null));
  }
  return 0;
}

/**
 * Short type description for error messages
 */
export function describeValue(value: Value | undefined): string {
  if (value === undefined) return 'undefined';
  if (value === null) return 'None';
  if (Array.isArray(value)) return 'list';
  if (isValueRecord(value)) return 'record';
  return typeof value;
}
