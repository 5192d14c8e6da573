import { readFileSync } from 'node:fs';
import { parse } from 'yaml';
import { describeCause, TemplateSourceError } from '../api/errors';
import { RawTemplate, validateTemplate } from '../api/template';

/**
 * Parses a YAML template document. Function literals stay as text; they are compiled later.
 */
export function parseTemplate(text: string): RawTemplate {
  let document: unknown;
  try {
    document = parse(text);
  } catch (err) {
    throw new TemplateSourceError(`Cannot parse template: ${describeCause(err)}`, { cause: err });
  }
  return validateTemplate(document);
}

export function readTemplate(path: string): RawTemplate {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (err) {
    throw new TemplateSourceError(`Cannot read template ${path}: ${describeCause(err)}`, { cause: err });
  }
  return parseTemplate(text);
}
