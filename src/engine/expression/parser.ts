import { ExpressionSyntaxError } from '../../api/errors';
import { ExprNode, ExprType } from '../ast';
import { Token, tokenize } from './lexer';

const KEYWORDS = new Map<string, boolean | null>([
  ['true', true],
  ['false', false],
  ['null', null],
]);

/**
 * Parses function-literal text into an expression tree.
 *
 * @example
 * ```typescript
 * parseExpression('split($, ", ")[0] | upper');
 * ```
 */
export function parseExpression(source: string): ExprNode {
  const tokens = tokenize(source);
  let pos = 0;

  function peek(): Token {
    return tokens[pos];
  }

  function consume(): Token {
    const token = tokens[pos];
    if (token.type !== 'eof') pos++;
    return token;
  }

  function isPunct(value: string): boolean {
    const token = peek();
    return token.type === 'punct' && token.value === value;
  }

  function expect(value: string): Token {
    const token = consume();
    if (token.type !== 'punct' || token.value !== value) {
      throw unexpected(token, `expected '${value}'`);
    }
    return token;
  }

  function parseArguments(): ExprNode[] {
    const args: ExprNode[] = [];
    expect('(');
    if (isPunct(')')) {
      consume();
      return args;
    }
    args.push(parsePipe());
    while (isPunct(',')) {
      consume();
      args.push(parsePipe());
    }
    expect(')');
    return args;
  }

  function parsePrimary(): ExprNode {
    const token = consume();
    switch (token.type) {
      case 'number':
        return { type: ExprType.LITERAL, value: Number(token.value) };
      case 'string':
        return { type: ExprType.LITERAL, value: token.value };
      case 'arg':
        // `$` is shorthand for `$1`
        return { type: ExprType.ARG, index: token.value === '$' ? 0 : Number(token.value.slice(1)) - 1 };
      case 'identifier':
        const keyword = KEYWORDS.get(token.value);
        if (keyword !== undefined) {
          return { type: ExprType.LITERAL, value: keyword };
        }
        if (isPunct('(')) {
          return { type: ExprType.CALL, name: token.value, args: parseArguments() };
        }
        return { type: ExprType.REF, name: token.value };
      case 'punct':
        if (token.value === '(') {
          const inner = parsePipe();
          expect(')');
          return inner;
        }
        if (token.value === '-' && peek().type === 'number') {
          return { type: ExprType.LITERAL, value: -Number(consume().value) };
        }
        throw unexpected(token);
      case 'eof':
        throw unexpected(token);
      default:
        token.type satisfies never;
        throw unexpected(token);
    }
  }

  function parsePostfix(): ExprNode {
    let node = parsePrimary();
    while (isPunct('[')) {
      consume();
      const index = parsePipe();
      expect(']');
      node = { type: ExprType.INDEX, target: node, index };
    }
    return node;
  }

  function parseConcat(): ExprNode {
    let left = parsePostfix();
    while (isPunct('+')) {
      consume();
      left = { type: ExprType.CONCAT, left, right: parsePostfix() };
    }
    return left;
  }

  function parsePipe(): ExprNode {
    let node = parseConcat();
    while (isPunct('|')) {
      consume();
      const name = consume();
      if (name.type !== 'identifier' || KEYWORDS.has(name.value)) {
        throw unexpected(name, 'expected a function name after |');
      }
      const rest = isPunct('(') ? parseArguments() : [];
      node = { type: ExprType.CALL, name: name.value, args: [node, ...rest] };
    }
    return node;
  }

  const tree = parsePipe();
  const trailing = peek();
  if (trailing.type !== 'eof') {
    throw unexpected(trailing);
  }
  return tree;
}

function unexpected(token: Token, hint?: string): ExpressionSyntaxError {
  const what = token.type === 'eof' ? 'end of expression' : `'${token.value}'`;
  return new ExpressionSyntaxError(`Unexpected ${what}${hint ? `, ${hint}` : ''}`, token.position);
}

/**
 * Names of every function an expression calls or references.
 */
export function collectFunctionNames(node: ExprNode, names: Set<string> = new Set()): Set<string> {
  switch (node.type) {
    case ExprType.CALL:
      names.add(node.name);
      node.args.forEach(arg => collectFunctionNames(arg, names));
      break;
    case ExprType.REF:
      names.add(node.name);
      break;
    case ExprType.INDEX:
      collectFunctionNames(node.target, names);
      collectFunctionNames(node.index, names);
      break;
    case ExprType.CONCAT:
      collectFunctionNames(node.left, names);
      collectFunctionNames(node.right, names);
      break;
    case ExprType.LITERAL:
    case ExprType.ARG:
      break;
    default:
      node satisfies never;
  }
  return names;
}
