import { ExpressionSyntaxError } from '../../api/errors';

export type TokenType = 'number' | 'string' | 'identifier' | 'arg' | 'punct' | 'eof';

export interface Token {
  type: TokenType;
  value: string;
  position: number;
}

const PUNCTUATION = ['(', ')', '[', ']', ',', '+', '|', '-'];

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
};

/**
 * Splits function-literal text into tokens.
 */
export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < source.length) {
    const char = source[pos];

    if (/\s/.test(char)) {
      pos++;
      continue;
    }

    if (char === '"' || char === "'") {
      const start = pos;
      let value = '';
      pos++;
      while (pos < source.length && source[pos] !== char) {
        if (source[pos] === '\\' && pos + 1 < source.length) {
          const escaped = source[pos + 1];
          value += ESCAPES[escaped] ?? escaped;
          pos += 2;
        } else {
          value += source[pos++];
        }
      }
      if (pos >= source.length) {
        throw new ExpressionSyntaxError('Unterminated string literal', start);
      }
      pos++;
      tokens.push({ type: 'string', value, position: start });
      continue;
    }

    if (/\d/.test(char)) {
      const match = /^\d+(\.\d+)?/.exec(source.slice(pos));
      const value = match ? match[0] : char;
      tokens.push({ type: 'number', value, position: pos });
      pos += value.length;
      continue;
    }

    if (char === '$') {
      const match = /^\$\d*/.exec(source.slice(pos));
      const value = match ? match[0] : char;
      if (value !== '$' && Number(value.slice(1)) === 0) {
        throw new ExpressionSyntaxError('Argument numbers start at $1', pos);
      }
      tokens.push({ type: 'arg', value, position: pos });
      pos += value.length;
      continue;
    }

    if (/[A-Za-z_]/.test(char)) {
      const match = /^[A-Za-z_][A-Za-z0-9_]*/.exec(source.slice(pos));
      const value = match ? match[0] : char;
      tokens.push({ type: 'identifier', value, position: pos });
      pos += value.length;
      continue;
    }

    if (PUNCTUATION.includes(char)) {
      tokens.push({ type: 'punct', value: char, position: pos });
      pos++;
      continue;
    }

    throw new ExpressionSyntaxError(`Unexpected character '${char}'`, pos);
  }

  tokens.push({ type: 'eof', value: '', position: source.length });
  return tokens;
}
