// Expression Parser
//
// Parses condition and value expressions used by dialog steps:
// - "hello" or 'hello' → string literal
// - 42, 3.14 → number literal
// - true, false, null → literals
// - user.name, dialog.items[0], turn.recognized.entities['city'] → memory reads
// - !, unary -, * / %, + -, < <= > >=, == !=, &&, || with the usual precedence
// - length(user.name), concat('a', 'b') → function calls
// - [1, 'two'] → array literal

import { EvaluationError } from '../errors';

export class ExpressionParseError extends EvaluationError {
  constructor(message: string, public readonly position: number, expression: string) {
    super(`${message} at ${position} in '${expression}'`, { expression });
  }
}

export type BinaryOperator =
  | '||'
  | '&&'
  | '=='
  | '!='
  | '<'
  | '<='
  | '>'
  | '>='
  | '+'
  | '-'
  | '*'
  | '/'
  | '%';

export type ExprNode =
  | { type: 'literal'; value: string | number | boolean | null }
  | { type: 'identifier'; name: string }
  | { type: 'member'; object: ExprNode; property: string }
  | { type: 'index'; object: ExprNode; index: ExprNode }
  | { type: 'unary'; op: '!' | '-'; operand: ExprNode }
  | { type: 'binary'; op: BinaryOperator; left: ExprNode; right: ExprNode }
  | { type: 'call'; callee: string; args: ExprNode[] }
  | { type: 'array'; elements: ExprNode[] };

// Tokenizer
type Token =
  | { type: 'identifier'; value: string; pos: number }
  | { type: 'number'; value: number; pos: number }
  | { type: 'string'; value: string; pos: number }
  | { type: 'punct'; value: string; pos: number };

const PUNCTUATION = ['&&', '||', '==', '!=', '<=', '>=', '<', '>', '+', '-', '*', '/', '%', '!', '(', ')', '[', ']', ',', '.'];

function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < input.length) {
    // Skip whitespace
    if (/\s/.test(input[i])) {
      i++;
      continue;
    }

    const start = i;

    // String: "..." or '...'
    if (input[i] === '"' || input[i] === "'") {
      const quote = input[i++];
      let value = '';
      while (i < input.length && input[i] !== quote) {
        if (input[i] === '\\' && i + 1 < input.length) {
          i++;
          switch (input[i]) {
            case 'n': value += '\n'; break;
            case 't': value += '\t'; break;
            case '\\': value += '\\'; break;
            default: value += input[i];
          }
        } else {
          value += input[i];
        }
        i++;
      }
      if (i >= input.length) {
        throw new ExpressionParseError('Unterminated string', start, input);
      }
      i++; // Skip closing quote
      tokens.push({ type: 'string', value, pos: start });
      continue;
    }

    // Number
    if (/[0-9]/.test(input[i])) {
      let numStr = '';
      while (i < input.length && /[0-9.]/.test(input[i])) {
        numStr += input[i++];
      }
      const value = Number(numStr);
      if (Number.isNaN(value)) {
        throw new ExpressionParseError(`Invalid number '${numStr}'`, start, input);
      }
      tokens.push({ type: 'number', value, pos: start });
      continue;
    }

    // Identifier (including keywords)
    if (/[A-Za-z_$]/.test(input[i])) {
      let ident = '';
      while (i < input.length && /[A-Za-z0-9_$]/.test(input[i])) {
        ident += input[i++];
      }
      tokens.push({ type: 'identifier', value: ident, pos: start });
      continue;
    }

    const punct = PUNCTUATION.find((p) => input.startsWith(p, i));
    if (punct) {
      tokens.push({ type: 'punct', value: punct, pos: start });
      i += punct.length;
      continue;
    }

    throw new ExpressionParseError(`Unexpected character '${input[i]}'`, i, input);
  }

  return tokens;
}

const BINARY_LEVELS: ReadonlyArray<ReadonlyArray<BinaryOperator>> = [
  ['||'],
  ['&&'],
  ['==', '!='],
  ['<', '<=', '>', '>='],
  ['+', '-'],
  ['*', '/', '%'],
];

// Parser
export function parseExpression(input: string): ExprNode {
  const tokens = tokenize(input);
  if (tokens.length === 0) {
    throw new ExpressionParseError('Empty expression', 0, input);
  }

  let pos = 0;

  function peek(): Token | undefined {
    return tokens[pos];
  }

  function isPunct(value: string): boolean {
    const token = peek();
    return token !== undefined && token.type === 'punct' && token.value === value;
  }

  function expectPunct(value: string): void {
    const token = peek();
    if (!token || token.type !== 'punct' || token.value !== value) {
      throw new ExpressionParseError(`Expected '${value}'`, token ? token.pos : input.length, input);
    }
    pos++;
  }

  function parseBinary(level: number): ExprNode {
    if (level >= BINARY_LEVELS.length) {
      return parseUnary();
    }
    let left = parseBinary(level + 1);
    for (;;) {
      const token = peek();
      if (!token || token.type !== 'punct') return left;
      const op = BINARY_LEVELS[level].find((candidate) => candidate === token.value);
      if (!op) return left;
      pos++;
      const right = parseBinary(level + 1);
      left = { type: 'binary', op, left, right };
    }
  }

  function parseUnary(): ExprNode {
    if (isPunct('!')) {
      pos++;
      return { type: 'unary', op: '!', operand: parseUnary() };
    }
    if (isPunct('-')) {
      pos++;
      return { type: 'unary', op: '-', operand: parseUnary() };
    }
    return parsePostfix(parsePrimary());
  }

  function parseArguments(closing: string): ExprNode[] {
    const args: ExprNode[] = [];
    if (isPunct(closing)) {
      pos++;
      return args;
    }
    for (;;) {
      args.push(parseBinary(0));
      if (isPunct(',')) {
        pos++;
        continue;
      }
      expectPunct(closing);
      return args;
    }
  }

  function parsePrimary(): ExprNode {
    const token = peek();
    if (!token) {
      throw new ExpressionParseError('Unexpected end of input', input.length, input);
    }
    pos++;

    switch (token.type) {
      case 'number':
      case 'string':
        return { type: 'literal', value: token.value };

      case 'identifier':
        if (token.value === 'true') return { type: 'literal', value: true };
        if (token.value === 'false') return { type: 'literal', value: false };
        if (token.value === 'null') return { type: 'literal', value: null };
        if (isPunct('(')) {
          pos++;
          return { type: 'call', callee: token.value, args: parseArguments(')') };
        }
        return { type: 'identifier', name: token.value };

      case 'punct':
        if (token.value === '(') {
          const inner = parseBinary(0);
          expectPunct(')');
          return inner;
        }
        if (token.value === '[') {
          return { type: 'array', elements: parseArguments(']') };
        }
        throw new ExpressionParseError(`Unexpected '${token.value}'`, token.pos, input);
    }
  }

  function parsePostfix(node: ExprNode): ExprNode {
    for (;;) {
      if (isPunct('.')) {
        pos++;
        const name = peek();
        if (!name || name.type !== 'identifier') {
          throw new ExpressionParseError(
            'Expected property name after .',
            name ? name.pos : input.length,
            input,
          );
        }
        pos++;
        node = { type: 'member', object: node, property: name.value };
        continue;
      }
      if (isPunct('[')) {
        pos++;
        const index = parseBinary(0);
        expectPunct(']');
        node = { type: 'index', object: node, index };
        continue;
      }
      return node;
    }
  }

  const result = parseBinary(0);
  const rest = peek();
  if (rest) {
    throw new ExpressionParseError('Unexpected trailing input', rest.pos, input);
  }
  return result;
}

/** Root identifiers an expression reads, e.g. `user` and `turn` for `user.a + turn.b`. */
export function collectIdentifiers(node: ExprNode, into: Set<string> = new Set()): Set<string> {
  switch (node.type) {
    case 'literal':
      break;
    case 'identifier':
      into.add(node.name);
      break;
    case 'member':
      collectIdentifiers(node.object, into);
      break;
    case 'index':
      collectIdentifiers(node.object, into);
      collectIdentifiers(node.index, into);
      break;
    case 'unary':
      collectIdentifiers(node.operand, into);
      break;
    case 'binary':
      collectIdentifiers(node.left, into);
      collectIdentifiers(node.right, into);
      break;
    case 'call':
    case 'array':
      for (const arg of node.type === 'call' ? node.args : node.elements) {
        collectIdentifiers(arg, into);
      }
      break;
  }
  return into;
}
