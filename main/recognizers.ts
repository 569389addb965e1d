/**
 * Module: recognizers
 *
 * Recognizer contract and a regular-expression recognizer. Patterns may start
 * with the inline `(?i)` flag; named groups become entities.
 */
import { ConfigurationError } from './errors';
import type { RecognizerResult } from './shared/types/activity';

export const NONE_INTENT = 'None';

export interface Recognizer {
  recognize(utterance: string, locale: string): Promise<RecognizerResult>;
}

export type RegexIntent = { intent: string; pattern: string };

export function compileIntentPattern(pattern: string): RegExp {
  let source = pattern;
  let flags = '';
  const inline = /^\(\?([a-z]+)\)/.exec(source);
  if (inline) {
    for (const flag of inline[1]) {
      if (flag !== 'i' && flag !== 'm' && flag !== 's') {
        throw new ConfigurationError(`Unsupported inline flag '${flag}' in pattern '${pattern}'`);
      }
      if (!flags.includes(flag)) flags += flag;
    }
    source = source.slice(inline[0].length);
  }
  try {
    return new RegExp(source, flags);
  } catch (error) {
    throw new ConfigurationError(`Invalid intent pattern '${pattern}'`, { cause: error });
  }
}

export class RegexRecognizer implements Recognizer {
  private readonly intents: ReadonlyArray<{ intent: string; regex: RegExp }>;

  constructor(intents: ReadonlyArray<RegexIntent>) {
    this.intents = intents.map(({ intent, pattern }) => ({
      intent,
      regex: compileIntentPattern(pattern),
    }));
  }

  /** First matching pattern wins, in declaration order. */
  async recognize(utterance: string): Promise<RecognizerResult> {
    for (const { intent, regex } of this.intents) {
      const match = regex.exec(utterance);
      if (!match) continue;
      const entities: Record<string, unknown> = {};
      for (const [name, value] of Object.entries(match.groups ?? {})) {
        if (value !== undefined) entities[name] = value;
      }
      return { text: utterance, intent, score: 1, entities };
    }
    return { text: utterance, intent: NONE_INTENT, score: 0, entities: {} };
  }
}
