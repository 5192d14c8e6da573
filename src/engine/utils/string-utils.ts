function toCodePoints(str: string): number[] {
  const cps: number[] = [];
  for (const ch of str) {
    const cp = ch.codePointAt(0);
    if (cp !== undefined) cps.push(cp);
  }
  return cps;
}

/**
 * Orders strings by Unicode code point, so astral characters sort after the BMP
 * instead of in the middle of it as UTF-16 comparison would.
 */
export function compareCodePoints(a: string, b: string): number {
  const left = toCodePoints(a);
  const right = toCodePoints(b);
  const n = Math.min(left.length, right.length);
  for (let i = 0; i < n; i++) {
    if (left[i] !== right[i]) return left[i] - right[i];
  }
  return left.length - right.length;
}

export function sortColumnNames(names: Iterable<string>): string[] {
  return [...names].sort(compareCodePoints);
}
