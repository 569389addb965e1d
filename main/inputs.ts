/**
 * Module: inputs
 *
 * Prompt/recognize/validate cycle shared by the input steps. The step's
 * `this` scope tracks whether it has prompted and how many answers it has
 * seen; `turn.value` holds the candidate answer while validations run.
 */
import {
  formatChoicePrompt,
  normalizeChoices,
  recognizeChoice,
  recognizeConfirm,
  resolveChoiceOptions,
  type ChoiceLocaleOptions,
  type NormalizedChoice,
  type NumberSeparators,
} from './choices';
import type { DialogInstance } from './dialog-stack';
import { advanceFrame } from './dialog-stack';
import { EvaluationError } from './errors';
import { isTruthy } from './expr/evaluate';
import type { ExecutionHost, StepSignal } from './executor';
import type { DialogMemory } from './memory';
import type { CursorFrame } from './shared/types/state';
import { isInputStep, type InputStep } from './shared/types/steps';

type Recognized = { ok: true; value: unknown } | { ok: false };

type InputState = {
  prompted: boolean;
  turnCount: number;
};

function readInputState(frame: CursorFrame): InputState {
  const { prompted, turnCount } = frame.stepState;
  return {
    prompted: prompted === true,
    turnCount: typeof turnCount === 'number' ? turnCount : 0,
  };
}

/** The top frame sits on an input step that prompted in an earlier turn. */
export function isAwaitingInput(instance: DialogInstance): boolean {
  const frame = instance.topFrame();
  const step = instance.currentStep();
  if (!frame || !step) return false;
  return isInputStep(step) && readInputState(frame).prompted;
}

const ENGLISH_SEPARATORS: NumberSeparators = { decimalSeparator: '.', groupSeparator: ',' };

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * First number in `text`, read with the locale's separators: `1,000.5` in
 * English, `1.000,5` in German. Group separators count only between
 * three-digit groups.
 */
export function parseNumber(text: string, separators: NumberSeparators = ENGLISH_SEPARATORS): number | undefined {
  const decimal = escapeRegExp(separators.decimalSeparator);
  const group = escapeRegExp(separators.groupSeparator);
  const pattern = new RegExp(`-?\\d{1,3}(?:${group}\\d{3})+(?:${decimal}\\d+)?|-?\\d+(?:${decimal}\\d+)?`);
  const match = pattern.exec(text);
  if (!match) return undefined;
  const normalized = match[0].split(separators.groupSeparator).join('').replace(separators.decimalSeparator, '.');
  const value = Number(normalized);
  return Number.isNaN(value) ? undefined : value;
}

class InputContext {
  constructor(
    readonly host: ExecutionHost,
    readonly instance: DialogInstance,
    readonly frame: CursorFrame,
    readonly step: InputStep,
    readonly memory: DialogMemory,
    readonly localeOptions: ChoiceLocaleOptions,
  ) {}

  choices(): NormalizedChoice[] {
    const { step } = this;
    if (step.kind !== 'choiceInput') return [];
    if (step.choicesProperty) {
      const value = this.memory.get(step.choicesProperty);
      if (!Array.isArray(value)) {
        throw new EvaluationError(`'${step.choicesProperty}' does not hold a list of choices`, {
          expression: step.choicesProperty,
        });
      }
      return normalizeChoices(value);
    }
    return normalizeChoices(step.choices ?? []);
  }

  recognize(text: string): Recognized {
    const { step } = this;
    switch (step.kind) {
      case 'textInput': {
        const trimmed = text.trim();
        if (!trimmed) return { ok: false };
        switch (step.outputFormat ?? 'none') {
          case 'trim':
            return { ok: true, value: trimmed };
          case 'lowercase':
            return { ok: true, value: text.toLowerCase() };
          case 'uppercase':
            return { ok: true, value: text.toUpperCase() };
          default:
            return { ok: true, value: text };
        }
      }
      case 'numberInput': {
        const value = parseNumber(text, this.localeOptions);
        if (value === undefined) return { ok: false };
        return { ok: true, value: step.outputFormat === 'integer' ? Math.trunc(value) : value };
      }
      case 'confirmInput': {
        const value = recognizeConfirm(text, this.localeOptions);
        return value === undefined ? { ok: false } : { ok: true, value };
      }
      case 'choiceInput': {
        const found = recognizeChoice(text, this.choices());
        if (!found) return { ok: false };
        return { ok: true, value: step.outputFormat === 'index' ? found.index : found.value };
      }
    }
  }

  /** Non-string initial values go through the same recognition as typed input. */
  recognizeInitial(value: unknown): Recognized {
    if (this.step.kind === 'numberInput' && typeof value === 'number') return { ok: true, value };
    if (this.step.kind === 'confirmInput' && typeof value === 'boolean') return { ok: true, value };
    return this.recognize(typeof value === 'string' ? value : JSON.stringify(value));
  }

  isValid(value: unknown): boolean {
    const validations = this.step.validations ?? [];
    if (validations.length === 0) return true;
    this.memory.set('turn.value', value);
    return validations.every((expression) =>
      isTruthy(this.host.evaluator.evaluate(expression, this.memory)),
    );
  }

  async sendPrompt(template: string | undefined): Promise<void> {
    const { host, step } = this;
    const text = template ? await host.languageGenerator.resolve(template, this.memory, host.ctx.locale) : '';
    let decorated = text;
    if (step.kind === 'confirmInput') {
      const { confirm } = this.localeOptions;
      decorated = formatChoicePrompt(text, [confirm.yes, confirm.no], step.style ?? 'inline', this.localeOptions);
    } else if (step.kind === 'choiceInput') {
      const labels = this.choices().map((choice) => choice.value);
      decorated = formatChoicePrompt(text, labels, step.style ?? 'inline', this.localeOptions);
    }
    if (decorated) {
      await host.send({ type: 'message', text: decorated });
    }
  }

  accept(value: unknown): StepSignal {
    this.memory.set(this.step.property, value);
    advanceFrame(this.frame);
    return 'continue';
  }

  async suspendWith(template: string | undefined, state: InputState): Promise<StepSignal> {
    this.host.suspendIn(this.instance);
    await this.sendPrompt(template);
    this.frame.stepState.prompted = true;
    this.frame.stepState.turnCount = state.turnCount;
    return 'suspend';
  }
}

export async function runInputStep(
  host: ExecutionHost,
  instance: DialogInstance,
  frame: CursorFrame,
  step: InputStep,
): Promise<StepSignal> {
  const memory = host.memoryFor(instance, frame);
  const localeOptions = resolveChoiceOptions(
    host.config.choiceLocales,
    host.ctx.locale,
    host.config.defaultLocale,
  );
  const input = new InputContext(host, instance, frame, step, memory, localeOptions);
  const state = readInputState(frame);

  if (!state.prompted) {
    if (!step.alwaysPrompt) {
      if (memory.has(step.property)) {
        advanceFrame(frame);
        return 'continue';
      }
      if (step.value !== undefined) {
        const initial = host.evaluator.evaluate(step.value, memory);
        if (initial !== undefined && initial !== null) {
          const recognized = input.recognizeInitial(initial);
          if (recognized.ok && input.isValid(recognized.value)) {
            return input.accept(recognized.value);
          }
        }
      }
    }
    return input.suspendWith(step.prompt, state);
  }

  // Someone else took this turn's activity; ask again.
  if (host.ctx.activityConsumed || host.ctx.activity.type !== 'message') {
    return input.suspendWith(step.prompt, state);
  }

  host.ctx.activityConsumed = true;
  state.turnCount += 1;
  const recognized = input.recognize(host.ctx.activity.text ?? '');
  let retryPrompt: string | undefined;
  if (recognized.ok) {
    if (input.isValid(recognized.value)) {
      return input.accept(recognized.value);
    }
    retryPrompt = step.invalidPrompt ?? step.unrecognizedPrompt ?? step.prompt;
  } else {
    retryPrompt = step.unrecognizedPrompt ?? step.prompt;
  }

  if (step.maxTurnCount !== undefined && state.turnCount >= step.maxTurnCount) {
    host.logger.debug(
      `Input '${step.property}' gave up after ${state.turnCount} turn(s) in dialog '${instance.dialogId}'`,
    );
    if (step.defaultValue !== undefined) {
      return input.accept(host.evaluator.evaluate(step.defaultValue, memory));
    }
    advanceFrame(frame);
    return 'continue';
  }
  return input.suspendWith(retryPrompt, state);
}
