import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';

export const FIELDS_CSV = [
  '"field1","field2","field3"',
  '"foo bar","baz","and thats it"',
  '',
].join('\n');

export const EXPLODE_TEMPLATE = `
field1:
  field1: 'split($, " ")[0]'
  field2: 'split($, " ")[1]'
field2:
  field3: upper
  field4: lower
field3: field5
`;

export const COMBINE_TEMPLATE = `
field1:
  field1:
    args:
      - field1
      - field2
    func: 'split($1, " ")[0] + $2'
  field2: 'split($, " ")[1]'
field2:
  field3: upper
  field4: lower
field3: field5
`;

export const ADDRESS_CSV = '"address"\n"742, Evergreen Terrace, Springfield, IL, USA"\n';

export const ADDRESS_TEMPLATE = `
address:
  door: 'split($, ", ")[0]'
  street: 'split($, ", ")[1]'
  city: 'split($, ", ")[2]'
  state: 'split($, ", ")[3]'
  country: 'split($, ", ")[4]'
`;

/**
 * Creates a scratch directory, writes the given files into it and returns its path.
 */
export function scratchDir(files: Record<string, string> = {}): string {
  const dir = mkdtempSync(path.join(tmpdir(), 'csvshift-'));
  for (const [name, content] of Object.entries(files)) {
    writeFileSync(path.join(dir, name), content);
  }
  return dir;
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}
