import { TransformFn } from '../ast';
import { isEmpty, toText } from '../utils/value-utils';

function toTitleCase(value: unknown): string {
  return toText(value).replace(/\S+/g, word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

function toInteger(value: unknown, name: string): number {
  const n = typeof value === 'number' ? value : Number(toText(value));
  if (!Number.isInteger(n)) {
    throw new Error(`${name} must be an integer, got '${toText(value)}'`);
  }
  return n;
}

/**
 * Functions every template can call by name.
 */
export const builtInFunctions: Record<string, TransformFn> = {
  upper: (v: unknown) => toText(v).toUpperCase(),
  lower: (v: unknown) => toText(v).toLowerCase(),
  trim: (v: unknown) => toText(v).trim(),
  title: toTitleCase,

  split: (v: unknown, separator: unknown) => {
    if (separator === undefined) {
      throw new Error('split: a separator is required');
    }
    return toText(v).split(toText(separator));
  },

  splitPattern: (v: unknown, pattern: unknown, flags?: unknown) =>
    toText(v).split(new RegExp(toText(pattern), flags === undefined ? undefined : toText(flags))),

  join: (list: unknown, separator: unknown = '') =>
    Array.isArray(list) ? list.map(toText).join(toText(separator)) : toText(list),

  concat: (...values: unknown[]) => values.map(toText).join(''),

  replace: (v: unknown, search: unknown, replacement: unknown) =>
    toText(v).replaceAll(toText(search), () => toText(replacement)),

  substr: (v: unknown, start: unknown, length?: unknown) => {
    const text = toText(v);
    const from = toInteger(start, 'substr: start');
    if (length === undefined) return text.slice(from);
    const begin = from < 0 ? Math.max(text.length + from, 0) : from;
    return text.slice(begin, begin + toInteger(length, 'substr: length'));
  },

  length: (v: unknown) => (Array.isArray(v) ? v.length : toText(v).length),

  coalesce: (...values: unknown[]) => values.find(v => !isEmpty(v)),

  toNumber: (v: unknown) => {
    if (typeof v === 'number') return v;
    const n = Number(toText(v).trim());
    if (toText(v).trim() === '' || Number.isNaN(n)) {
      throw new Error(`toNumber: NaN for value '${toText(v)}'`);
    }
    return n;
  },
};
