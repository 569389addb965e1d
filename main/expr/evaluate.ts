/**
 * Module: expr/evaluate
 *
 * `ExpressionEvaluator` contract plus the default tree-walking evaluator.
 * Member access on `null`/`undefined` yields `undefined`; type mismatches in
 * operators and functions raise `EvaluationError`.
 */
import { EvaluationError } from '../errors';
import { isMemoryScopeName, isRecord, type MemoryReader } from '../memory';
import { collectIdentifiers, parseExpression, type ExprNode } from './parse';

export interface ExpressionEvaluator {
  evaluate(expression: string, memory: MemoryReader): unknown;
  /** Syntax and scope check without memory; throws on a malformed expression. */
  check?(expression: string): void;
}

type ExprFunction = (args: unknown[], expression: string) => unknown;

export function isTruthy(value: unknown): boolean {
  return !(value === undefined || value === null || value === false || value === 0 || value === '');
}

export function stringify(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

function lengthOf(value: unknown, expression: string): number {
  if (typeof value === 'string' || Array.isArray(value)) return value.length;
  if (isRecord(value)) return Object.keys(value).length;
  if (value === undefined || value === null) return 0;
  throw new EvaluationError(`length() expects a string, array or object`, { expression });
}

function toNumber(value: unknown, expression: string): number {
  const n = typeof value === 'number' ? value : typeof value === 'string' ? Number(value.trim()) : NaN;
  if (typeof value === 'string' && value.trim() === '') {
    throw new EvaluationError(`Cannot convert '' to a number`, { expression });
  }
  if (Number.isNaN(n)) {
    throw new EvaluationError(`Cannot convert ${stringify(value)} to a number`, { expression });
  }
  return n;
}

function isEqual(a: unknown, b: unknown): boolean {
  if ((a === undefined || a === null) && (b === undefined || b === null)) return true;
  if (typeof a === 'object' && a !== null && typeof b === 'object' && b !== null) {
    return JSON.stringify(a) === JSON.stringify(b);
  }
  return a === b;
}

const builtinFunctions: Record<string, ExprFunction> = {
  json: ([value]) => JSON.stringify(value ?? null),
  length: ([value], expression) => lengthOf(value, expression),
  count: ([value], expression) => lengthOf(value, expression),
  exists: ([value]) => value !== undefined && value !== null,
  string: ([value]) => stringify(value),
  int: ([value], expression) => Math.trunc(toNumber(value, expression)),
  float: ([value], expression) => toNumber(value, expression),
  toLower: ([value]) => stringify(value).toLowerCase(),
  toUpper: ([value]) => stringify(value).toUpperCase(),
  concat: (args) => args.map(stringify).join(''),
  join: ([items, separator], expression) => {
    if (!Array.isArray(items)) {
      throw new EvaluationError('join() expects an array', { expression });
    }
    return items.map(stringify).join(separator === undefined ? ',' : stringify(separator));
  },
  contains: ([collection, item]) => {
    if (typeof collection === 'string') return collection.includes(stringify(item));
    if (Array.isArray(collection)) return collection.some((entry) => isEqual(entry, item));
    if (isRecord(collection)) return Object.hasOwn(collection, stringify(item));
    return false;
  },
  if: ([condition, whenTrue, whenFalse]) => (isTruthy(condition) ? whenTrue : whenFalse),
};

export class DefaultExpressionEvaluator implements ExpressionEvaluator {
  private readonly cache = new Map<string, ExprNode>();
  private readonly functions: Record<string, ExprFunction>;

  constructor(extraFunctions?: Record<string, ExprFunction>) {
    this.functions = { ...builtinFunctions, ...extraFunctions };
  }

  private parse(expression: string): ExprNode {
    let node = this.cache.get(expression);
    if (!node) {
      node = parseExpression(expression);
      this.cache.set(expression, node);
    }
    return node;
  }

  check(expression: string): void {
    const node = this.parse(expression);
    for (const name of collectIdentifiers(node)) {
      if (!isMemoryScopeName(name)) {
        throw new EvaluationError(`Unknown identifier '${name}'`, { expression });
      }
    }
    this.checkCalls(node, expression);
  }

  private checkCalls(node: ExprNode, expression: string): void {
    switch (node.type) {
      case 'call':
        if (!Object.hasOwn(this.functions, node.callee)) {
          throw new EvaluationError(`Unknown function '${node.callee}'`, { expression });
        }
        node.args.forEach((arg) => this.checkCalls(arg, expression));
        return;
      case 'member':
        this.checkCalls(node.object, expression);
        return;
      case 'index':
        this.checkCalls(node.object, expression);
        this.checkCalls(node.index, expression);
        return;
      case 'unary':
        this.checkCalls(node.operand, expression);
        return;
      case 'binary':
        this.checkCalls(node.left, expression);
        this.checkCalls(node.right, expression);
        return;
      case 'array':
        node.elements.forEach((element) => this.checkCalls(element, expression));
        return;
      case 'literal':
      case 'identifier':
        return;
    }
  }

  evaluate(expression: string, memory: MemoryReader): unknown {
    return this.evalNode(this.parse(expression), memory, expression);
  }

  private evalNode(node: ExprNode, memory: MemoryReader, expression: string): unknown {
    switch (node.type) {
      case 'literal':
        return node.value;

      case 'identifier':
        if (!isMemoryScopeName(node.name)) {
          throw new EvaluationError(`Unknown identifier '${node.name}'`, { expression });
        }
        return memory.get(node.name);

      case 'member':
        return readProperty(this.evalNode(node.object, memory, expression), node.property);

      case 'index': {
        const target = this.evalNode(node.object, memory, expression);
        const key = this.evalNode(node.index, memory, expression);
        if (typeof key !== 'string' && typeof key !== 'number') {
          throw new EvaluationError(`Index must be a string or number`, { expression });
        }
        return readProperty(target, key);
      }

      case 'unary': {
        const operand = this.evalNode(node.operand, memory, expression);
        if (node.op === '!') return !isTruthy(operand);
        if (typeof operand !== 'number') {
          throw new EvaluationError(`Unary '-' expects a number`, { expression });
        }
        return -operand;
      }

      case 'binary':
        return this.evalBinary(node.op, node.left, node.right, memory, expression);

      case 'call': {
        const fn = Object.hasOwn(this.functions, node.callee) ? this.functions[node.callee] : undefined;
        if (!fn) {
          throw new EvaluationError(`Unknown function '${node.callee}'`, { expression });
        }
        return fn(
          node.args.map((arg) => this.evalNode(arg, memory, expression)),
          expression,
        );
      }

      case 'array':
        return node.elements.map((element) => this.evalNode(element, memory, expression));
    }
  }

  private evalBinary(
    op: Extract<ExprNode, { type: 'binary' }>['op'],
    leftNode: ExprNode,
    rightNode: ExprNode,
    memory: MemoryReader,
    expression: string,
  ): unknown {
    const left = this.evalNode(leftNode, memory, expression);
    if (op === '&&') return isTruthy(left) && isTruthy(this.evalNode(rightNode, memory, expression));
    if (op === '||') return isTruthy(left) || isTruthy(this.evalNode(rightNode, memory, expression));

    const right = this.evalNode(rightNode, memory, expression);
    switch (op) {
      case '==':
        return isEqual(left, right);
      case '!=':
        return !isEqual(left, right);
      case '<':
      case '<=':
      case '>':
      case '>=':
        if (typeof left === 'number' && typeof right === 'number') return compare(op, left, right);
        if (typeof left === 'string' && typeof right === 'string') return compare(op, left, right);
        throw new EvaluationError(
          `Operator '${op}' cannot compare ${describe(left)} with ${describe(right)}`,
          { expression },
        );
      case '+':
        if (typeof left === 'number' && typeof right === 'number') return left + right;
        if (typeof left === 'string' || typeof right === 'string') {
          return stringify(left) + stringify(right);
        }
        throw new EvaluationError(
          `Operator '+' cannot combine ${describe(left)} with ${describe(right)}`,
          { expression },
        );
      case '-':
      case '*':
      case '/':
      case '%': {
        if (typeof left !== 'number' || typeof right !== 'number') {
          throw new EvaluationError(
            `Operator '${op}' expects numbers (got ${describe(left)} and ${describe(right)})`,
            { expression },
          );
        }
        if ((op === '/' || op === '%') && right === 0) {
          throw new EvaluationError('Division by zero', { expression });
        }
        if (op === '-') return left - right;
        if (op === '*') return left * right;
        if (op === '/') return left / right;
        return left % right;
      }
    }
  }
}

function compare<T extends number | string>(op: '<' | '<=' | '>' | '>=', left: T, right: T): boolean {
  if (op === '<') return left < right;
  if (op === '<=') return left <= right;
  if (op === '>') return left > right;
  return left >= right;
}

function describe(value: unknown): string {
  if (value === undefined) return 'undefined';
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function readProperty(target: unknown, key: string | number): unknown {
  if (target === undefined || target === null) return undefined;
  if (typeof target === 'string' || Array.isArray(target)) {
    if (key === 'length' || key === 'Length') return target.length;
    if (typeof key === 'number') return target[key];
    return undefined;
  }
  if (isRecord(target)) {
    const name = String(key);
    return Object.hasOwn(target, name) ? target[name] : undefined;
  }
  return undefined;
}
