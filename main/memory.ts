/**
 * Module: memory
 *
 * Layered memory scopes addressed by property paths such as
 * `user.profile.name`, `dialog.items[0]` or `conversation['flags']`.
 *
 * - `user` / `conversation` persist across turns and dialogs
 * - `dialog` belongs to one dialog instance and dies with it
 * - `turn` is rebuilt for every turn
 * - `this` is the state bag of the step the cursor is on
 */
import { ConfigurationError, EvaluationError } from './errors';

export const MEMORY_SCOPES = ['user', 'conversation', 'dialog', 'turn', 'this'] as const;
export type MemoryScopeName = (typeof MEMORY_SCOPES)[number];

export type PathSegment = string | number;

export interface PropertyPath {
  raw: string;
  scope: MemoryScopeName;
  segments: PathSegment[];
}

export type MemoryBag = Record<string, unknown>;

export type MemoryScopes = Record<MemoryScopeName, MemoryBag>;

export interface MemoryReader {
  get(path: string): unknown;
}

export function isMemoryScopeName(value: string): value is MemoryScopeName {
  return (MEMORY_SCOPES as readonly string[]).includes(value);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const IDENT_START = /[A-Za-z_$]/;
const IDENT_PART = /[A-Za-z0-9_$]/;

const parsedPaths = new Map<string, PropertyPath>();

/** Keys that would reach an object's prototype chain. */
const RESERVED_KEYS: ReadonlySet<string> = new Set(['__proto__', 'constructor', 'prototype']);

/**
 * Parse a property path. Malformed paths and unknown scopes are configuration
 * errors: paths come from dialog definitions.
 */
export function parsePropertyPath(raw: string): PropertyPath {
  const cached = parsedPaths.get(raw);
  if (cached) return cached;

  const text = raw.trim();
  const segments: PathSegment[] = [];
  let i = 0;

  const fail = (reason: string): never => {
    throw new ConfigurationError(`Malformed property path '${raw}': ${reason} at ${i}`);
  };

  const readIdentifier = (): string => {
    if (i >= text.length || !IDENT_START.test(text[i])) fail('expected identifier');
    const start = i;
    while (i < text.length && IDENT_PART.test(text[i])) i++;
    return text.slice(start, i);
  };

  segments.push(readIdentifier());
  while (i < text.length) {
    const ch = text[i];
    if (ch === '.') {
      i++;
      segments.push(readIdentifier());
      continue;
    }
    if (ch === '[') {
      i++;
      const quote = text[i];
      if (quote === '"' || quote === "'") {
        i++;
        const end = text.indexOf(quote, i);
        if (end < 0) fail('unterminated key');
        segments.push(text.slice(i, end));
        i = end + 1;
      } else {
        const start = i;
        while (i < text.length && /[0-9]/.test(text[i])) i++;
        if (start === i) fail('expected index');
        segments.push(Number(text.slice(start, i)));
      }
      if (text[i] !== ']') fail("expected ']'");
      i++;
      continue;
    }
    fail(`unexpected '${ch}'`);
  }

  const scope = segments.shift();
  if (typeof scope !== 'string' || !isMemoryScopeName(scope)) {
    throw new ConfigurationError(`Unknown memory scope '${String(scope)}' in path '${raw}'`);
  }
  const reserved = segments.find((segment) => typeof segment === 'string' && RESERVED_KEYS.has(segment));
  if (reserved !== undefined) {
    throw new ConfigurationError(`Property path '${raw}' uses reserved key '${reserved}'`);
  }
  const parsed: PropertyPath = { raw, scope, segments };
  parsedPaths.set(raw, parsed);
  return parsed;
}

/** A path whose value must outlive the current step, so not in `this`. */
export function parseBindingPath(raw: string): PropertyPath {
  const parsed = parsePropertyPath(raw);
  if (parsed.scope === 'this') {
    throw new ConfigurationError(`Loop binding '${raw}' cannot use the 'this' scope`);
  }
  return parsed;
}

function readChild(container: unknown, segment: PathSegment): unknown {
  if (Array.isArray(container)) {
    return typeof segment === 'number' ? container[segment] : undefined;
  }
  if (isRecord(container)) {
    const key = String(segment);
    return Object.hasOwn(container, key) ? container[key] : undefined;
  }
  return undefined;
}

function cloneValue(value: unknown, path: string): unknown {
  try {
    return structuredClone(value);
  } catch (error) {
    throw new EvaluationError(`Value for '${path}' cannot be stored in memory`, {
      cause: error,
      expression: path,
    });
  }
}

/**
 * Read/write view over one set of scopes. The manager builds one per dialog
 * instance and step; writes touch only the scope the path names.
 */
export class DialogMemory implements MemoryReader {
  constructor(private readonly scopes: MemoryScopes) {}

  scope(name: MemoryScopeName): MemoryBag {
    return this.scopes[name];
  }

  get(path: string): unknown {
    const parsed = parsePropertyPath(path);
    let current: unknown = this.scopes[parsed.scope];
    for (const segment of parsed.segments) {
      current = readChild(current, segment);
      if (current === undefined) return undefined;
    }
    return current;
  }

  has(path: string): boolean {
    const value = this.get(path);
    return value !== undefined && value !== null;
  }

  /**
   * Write a deep copy of `value`. Missing intermediates become arrays when the
   * next segment is an index and objects otherwise. Writing `undefined`
   * removes the property.
   */
  set(path: string, value: unknown): void {
    const parsed = parsePropertyPath(path);
    if (parsed.segments.length === 0) {
      throw new EvaluationError(`Cannot assign the whole '${parsed.scope}' scope`, {
        expression: path,
      });
    }
    if (value === undefined) {
      this.delete(path);
      return;
    }

    let container: unknown = this.scopes[parsed.scope];
    const last = parsed.segments.length - 1;
    for (let i = 0; i < last; i++) {
      const segment = parsed.segments[i];
      let next = readChild(container, segment);
      if (next === undefined || next === null) {
        next = typeof parsed.segments[i + 1] === 'number' ? [] : {};
        assignChild(container, segment, next, path);
      } else if (typeof next !== 'object') {
        throw new EvaluationError(
          `Cannot write '${path}': '${String(segment)}' holds a ${typeof next}`,
          { expression: path },
        );
      }
      container = next;
    }
    assignChild(container, parsed.segments[last], cloneValue(value, path), path);
  }

  delete(path: string): boolean {
    const parsed = parsePropertyPath(path);
    if (parsed.segments.length === 0) {
      throw new EvaluationError(`Cannot delete the whole '${parsed.scope}' scope`, {
        expression: path,
      });
    }
    let container: unknown = this.scopes[parsed.scope];
    const last = parsed.segments.length - 1;
    for (let i = 0; i < last; i++) {
      container = readChild(container, parsed.segments[i]);
      if (container === undefined) return false;
    }
    const key = parsed.segments[last];
    if (Array.isArray(container)) {
      if (typeof key !== 'number' || key >= container.length) return false;
      container.splice(key, 1);
      return true;
    }
    if (isRecord(container)) {
      const name = String(key);
      if (!Object.hasOwn(container, name)) return false;
      delete container[name];
      return true;
    }
    return false;
  }

  /** Deep copy of every scope, for trace activities and diagnostics. */
  snapshot(): MemoryScopes {
    return structuredClone(this.scopes);
  }
}

function assignChild(container: unknown, segment: PathSegment, value: unknown, path: string): void {
  if (Array.isArray(container)) {
    if (typeof segment !== 'number') {
      throw new EvaluationError(`Cannot write '${path}': '${segment}' is not an array index`, {
        expression: path,
      });
    }
    container[segment] = value;
    return;
  }
  if (isRecord(container)) {
    container[String(segment)] = value;
    return;
  }
  throw new EvaluationError(`Cannot write '${path}': parent is not an object`, { expression: path });
}

export function createScopes(partial?: Partial<MemoryScopes>): MemoryScopes {
  return {
    user: partial?.user ?? {},
    conversation: partial?.conversation ?? {},
    dialog: partial?.dialog ?? {},
    turn: partial?.turn ?? {},
    this: partial?.this ?? {},
  };
}
