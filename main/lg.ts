/**
 * Module: lg
 *
 * Language generation contract and the default `{expression}` template
 * resolver. `\{` and `\}` produce literal braces.
 */
import { EvaluationError } from './errors';
import { stringify, type ExpressionEvaluator } from './expr/evaluate';
import type { MemoryReader } from './memory';

export interface LanguageGenerator {
  resolve(template: string, memory: MemoryReader, locale: string): Promise<string>;
  check?(template: string): void;
}

type TemplatePart = { kind: 'text'; text: string } | { kind: 'expr'; expression: string };

/** Index of the `}` closing the expression that starts at `start`; braces inside string literals do not count. */
function closingBrace(template: string, start: number): number {
  let quote: string | undefined;
  for (let i = start; i < template.length; i++) {
    const ch = template[i];
    if (quote) {
      if (ch === '\\') i++;
      else if (ch === quote) quote = undefined;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '}') {
      return i;
    }
  }
  return -1;
}

export function splitTemplate(template: string): TemplatePart[] {
  const parts: TemplatePart[] = [];
  let text = '';
  let i = 0;
  while (i < template.length) {
    const ch = template[i];
    if (ch === '\\' && (template[i + 1] === '{' || template[i + 1] === '}')) {
      text += template[i + 1];
      i += 2;
      continue;
    }
    if (ch === '{') {
      const end = closingBrace(template, i + 1);
      if (end < 0) {
        throw new EvaluationError(`Unterminated '{' at ${i} in template`, { expression: template });
      }
      if (text) parts.push({ kind: 'text', text });
      text = '';
      parts.push({ kind: 'expr', expression: template.slice(i + 1, end) });
      i = end + 1;
      continue;
    }
    text += ch;
    i++;
  }
  if (text) parts.push({ kind: 'text', text });
  return parts;
}

export class TemplateLanguageGenerator implements LanguageGenerator {
  private readonly cache = new Map<string, TemplatePart[]>();

  constructor(private readonly evaluator: ExpressionEvaluator) {}

  private parts(template: string): TemplatePart[] {
    let parts = this.cache.get(template);
    if (!parts) {
      parts = splitTemplate(template);
      this.cache.set(template, parts);
    }
    return parts;
  }

  check(template: string): void {
    for (const part of this.parts(template)) {
      if (part.kind === 'expr') this.evaluator.check?.(part.expression);
    }
  }

  async resolve(template: string, memory: MemoryReader): Promise<string> {
    let out = '';
    for (const part of this.parts(template)) {
      out += part.kind === 'text' ? part.text : stringify(this.evaluator.evaluate(part.expression, memory));
    }
    return out;
  }
}
