/**
 * Module: choices
 *
 * Locale-aware rendering and recognition for choice and confirm inputs.
 * The locale table is plain configuration handed in through `EngineConfig`.
 */
import defaultLocales from './data/choice-locales.json';
import type { ListStyle } from './shared/types/steps';

export type ConfirmLabels = Readonly<{
  yes: string;
  no: string;
  yesWords: ReadonlyArray<string>;
  noWords: ReadonlyArray<string>;
}>;

export type ChoiceLocaleOptions = Readonly<{
  inlineSeparator: string;
  inlineOr: string;
  inlineOrMore: string;
  includeNumbers: boolean;
  /** Number separators for `numberInput`, e.g. `.` and `,` in English. */
  decimalSeparator: string;
  groupSeparator: string;
  confirm: ConfirmLabels;
}>;

export type NumberSeparators = Pick<ChoiceLocaleOptions, 'decimalSeparator' | 'groupSeparator'>;

export type ChoiceLocaleTable = Readonly<Record<string, ChoiceLocaleOptions>>;

export const DEFAULT_CHOICE_LOCALES: ChoiceLocaleTable = Object.freeze({ ...defaultLocales });

export type NormalizedChoice = { value: string; synonyms: string[] };

export type FoundChoice = { value: string; index: number };

/**
 * Exact locale first (`en-us`), then its language (`en`), then the fallback
 * locale, then English.
 */
export function resolveChoiceOptions(
  table: ChoiceLocaleTable,
  locale: string | undefined,
  fallbackLocale: string,
): ChoiceLocaleOptions {
  const candidates = [locale, fallbackLocale, 'en'];
  for (const candidate of candidates) {
    if (!candidate) continue;
    const key = candidate.toLowerCase();
    const exact = Object.hasOwn(table, key) ? table[key] : undefined;
    if (exact) return exact;
    const language = key.split(/[-_]/)[0];
    const byLanguage = Object.hasOwn(table, language) ? table[language] : undefined;
    if (byLanguage) return byLanguage;
  }
  return DEFAULT_CHOICE_LOCALES.en;
}

export function normalizeChoices(options: ReadonlyArray<unknown>): NormalizedChoice[] {
  const out: NormalizedChoice[] = [];
  for (const option of options) {
    if (typeof option === 'string') {
      out.push({ value: option, synonyms: [] });
    } else if (typeof option === 'number' || typeof option === 'boolean') {
      out.push({ value: String(option), synonyms: [] });
    } else if (typeof option === 'object' && option !== null && 'value' in option) {
      const value = option.value;
      if (typeof value !== 'string') continue;
      const synonyms =
        'synonyms' in option && Array.isArray(option.synonyms)
          ? option.synonyms.filter((s): s is string => typeof s === 'string')
          : [];
      out.push({ value, synonyms });
    }
  }
  return out;
}

/** `(1) red, (2) green, or (3) blue` */
export function inlineChoiceList(labels: ReadonlyArray<string>, options: ChoiceLocaleOptions): string {
  const items = labels.map((label, i) => (options.includeNumbers ? `(${i + 1}) ${label}` : label));
  if (items.length <= 1) return items.join('');
  if (items.length === 2) return `${items[0]}${options.inlineOr}${items[1]}`;
  return `${items.slice(0, -1).join(options.inlineSeparator)}${options.inlineOrMore}${items[items.length - 1]}`;
}

export function formatChoicePrompt(
  text: string,
  labels: ReadonlyArray<string>,
  style: ListStyle,
  options: ChoiceLocaleOptions,
): string {
  if (style === 'none' || labels.length === 0) return text;
  if (style === 'list') {
    const lines = labels.map((label, i) =>
      options.includeNumbers ? `   ${i + 1}. ${label}` : `   - ${label}`,
    );
    return text ? `${text}\n\n${lines.join('\n')}` : lines.join('\n');
  }
  const inline = inlineChoiceList(labels, options);
  return text ? `${text} ${inline}` : inline;
}

function normalizeText(text: string): string {
  return text.trim().toLowerCase();
}

/**
 * Exact value or synonym, then ordinal (`2`), then a choice value appearing
 * as a whole word in the utterance. Earlier choices win ties.
 */
export function recognizeChoice(
  utterance: string,
  choices: ReadonlyArray<NormalizedChoice>,
): FoundChoice | undefined {
  const text = normalizeText(utterance);
  if (!text) return undefined;

  for (let i = 0; i < choices.length; i++) {
    const choice = choices[i];
    if (normalizeText(choice.value) === text || choice.synonyms.some((s) => normalizeText(s) === text)) {
      return { value: choice.value, index: i };
    }
  }

  if (/^[0-9]+$/.test(text)) {
    const ordinal = Number(text);
    if (ordinal >= 1 && ordinal <= choices.length) {
      return { value: choices[ordinal - 1].value, index: ordinal - 1 };
    }
    return undefined;
  }

  const words = new Set(text.split(/[^\p{L}\p{N}]+/u).filter(Boolean));
  for (let i = 0; i < choices.length; i++) {
    const choice = choices[i];
    const names = [choice.value, ...choice.synonyms].map(normalizeText);
    if (names.some((name) => words.has(name))) {
      return { value: choice.value, index: i };
    }
  }
  return undefined;
}

export function recognizeConfirm(utterance: string, options: ChoiceLocaleOptions): boolean | undefined {
  const text = normalizeText(utterance);
  if (!text) return undefined;
  if (text === '1') return true;
  if (text === '2') return false;
  const { confirm } = options;
  if (normalizeText(confirm.yes) === text || confirm.yesWords.includes(text)) return true;
  if (normalizeText(confirm.no) === text || confirm.noWords.includes(text)) return false;
  const words = text.split(/[^\p{L}\p{N}]+/u).filter(Boolean);
  if (words.some((word) => confirm.yesWords.includes(word))) return true;
  if (words.some((word) => confirm.noWords.includes(word))) return false;
  return undefined;
}
