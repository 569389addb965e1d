/**
 * Module: executor
 *
 * Step semantics. `StepExecutor.execute` runs the step under an instance's
 * top cursor frame and reports whether the turn may continue. Anything that
 * reshapes the dialog stack goes through `ExecutionHost`, which the turn
 * runner implements.
 *
 * Conditionals and loops move the parent frame past themselves before
 * pushing the nested list, so a finished nested frame simply pops.
 */
import type { EngineConfig } from './config';
import { advanceFrame, type DialogInstance } from './dialog-stack';
import { EvaluationError } from './errors';
import { isTruthy, stringify, type ExpressionEvaluator } from './expr/evaluate';
import { runInputStep } from './inputs';
import type { LanguageGenerator } from './lg';
import type { Logger } from './log';
import { DialogMemory, parseBindingPath } from './memory';
import type { Activity, DialogEvent } from './shared/types/activity';
import type { CursorFrame, LoopState } from './shared/types/state';
import type {
  EditArrayStep,
  EditStepsStep,
  ForeachPageStep,
  ForeachStep,
  Step,
  SwitchConditionStep,
  TraceActivityStep,
} from './shared/types/steps';
import type { TurnContext } from './turn-context';

export type StepSignal = 'continue' | 'suspend';

export const DEFAULT_PAGE_SIZE = 10;

export type DialogCaller = { instance: DialogInstance; frame: CursorFrame };

export interface ExecutionHost {
  readonly ctx: TurnContext;
  readonly evaluator: ExpressionEvaluator;
  readonly languageGenerator: LanguageGenerator;
  readonly config: EngineConfig;
  readonly logger: Logger;
  memoryFor(instance: DialogInstance, frame?: CursorFrame): DialogMemory;
  send(activity: Activity): Promise<void>;
  /** Make `instance` the top of the stack, cancelling any dialogs above it. */
  prepareControlChange(instance: DialogInstance): void;
  /** End the turn inside `instance`; dialogs above it stay where they are. */
  suspendIn(instance: DialogInstance): void;
  beginDialog(dialogId: string, scope: Record<string, unknown>, caller?: DialogCaller): Promise<void>;
  replaceDialog(instance: DialogInstance, dialogId: string, scope: Record<string, unknown>): Promise<void>;
  endDialog(instance: DialogInstance, result: unknown): Promise<void>;
  repeatDialog(instance: DialogInstance): void;
  cancelAllDialogs(): void;
  emitEvent(instance: DialogInstance, event: DialogEvent): Promise<void>;
}

/**
 * Contiguous slices of `pageSize` items; the last one may be shorter.
 */
export function pageSlices<T>(items: ReadonlyArray<T>, pageSize: number): T[][] {
  if (!Number.isInteger(pageSize) || pageSize <= 0) {
    throw new EvaluationError(`Page size must be a positive integer (got ${pageSize})`);
  }
  const pages: T[][] = [];
  for (let start = 0; start < items.length; start += pageSize) {
    pages.push(items.slice(start, start + pageSize));
  }
  return pages;
}

export function switchCaseMatches(caseValue: string, value: unknown): boolean {
  if (typeof value === 'number') {
    return caseValue.trim() !== '' && Number(caseValue) === value;
  }
  if (typeof value === 'boolean') {
    return caseValue.trim().toLowerCase() === String(value);
  }
  if (typeof value === 'string') {
    return caseValue === value;
  }
  return false;
}

function sameValue(a: unknown, b: unknown): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

export class StepExecutor {
  constructor(private readonly host: ExecutionHost) {}

  private evaluate(expression: string, memory: DialogMemory): unknown {
    return this.host.evaluator.evaluate(expression, memory);
  }

  async execute(instance: DialogInstance, frame: CursorFrame, step: Step): Promise<StepSignal> {
    const host = this.host;
    const memory = host.memoryFor(instance, frame);

    switch (step.kind) {
      case 'sendActivity': {
        const text = await host.languageGenerator.resolve(step.activity, memory, host.ctx.locale);
        await host.send({ type: 'message', text });
        advanceFrame(frame);
        return 'continue';
      }

      case 'setProperty':
        memory.set(step.property, this.evaluate(step.value, memory));
        advanceFrame(frame);
        return 'continue';

      case 'initProperty':
        memory.set(step.property, step.type === 'array' ? [] : {});
        advanceFrame(frame);
        return 'continue';

      case 'deleteProperty':
        memory.delete(step.property);
        advanceFrame(frame);
        return 'continue';

      case 'editArray':
        this.editArray(step, memory);
        advanceFrame(frame);
        return 'continue';

      case 'ifCondition': {
        const branch = isTruthy(this.evaluate(step.condition, memory)) ? step.steps : step.elseSteps;
        advanceFrame(frame);
        if (branch && branch.length > 0) {
          instance.pushFrame('branch', instance.dialog.listIdOf(branch));
        }
        return 'continue';
      }

      case 'switchCondition': {
        const branch = this.selectCase(step, this.evaluate(step.condition, memory));
        advanceFrame(frame);
        if (branch && branch.length > 0) {
          instance.pushFrame('branch', instance.dialog.listIdOf(branch));
        }
        return 'continue';
      }

      case 'foreach':
      case 'foreachPage':
        this.startLoop(instance, frame, step, memory);
        return 'continue';

      case 'beginDialog': {
        const scope = this.evaluateOptions(step.options, memory);
        await host.beginDialog(step.dialog, scope, { instance, frame });
        return 'continue';
      }

      case 'replaceDialog': {
        const scope = this.evaluateOptions(step.options, memory);
        await host.replaceDialog(instance, step.dialog, scope);
        return 'continue';
      }

      case 'endDialog': {
        const result = step.value !== undefined ? this.evaluate(step.value, memory) : undefined;
        await host.endDialog(instance, result);
        return 'continue';
      }

      case 'repeatDialog':
        host.repeatDialog(instance);
        return 'continue';

      case 'cancelAllDialogs':
        host.cancelAllDialogs();
        return 'continue';

      case 'endTurn':
        host.suspendIn(instance);
        advanceFrame(frame);
        return 'suspend';

      case 'emitEvent': {
        const value = step.eventValue !== undefined ? this.evaluate(step.eventValue, memory) : undefined;
        advanceFrame(frame);
        await host.emitEvent(instance, {
          name: step.eventName,
          value,
          bubble: step.bubbleEvent ?? false,
        });
        return 'continue';
      }

      case 'editSteps':
        await this.editSteps(instance, frame, step);
        return 'continue';

      case 'traceActivity':
        await host.send(this.traceFor(step, memory));
        advanceFrame(frame);
        return 'continue';

      case 'logStep': {
        const text = await host.languageGenerator.resolve(step.text, memory, host.ctx.locale);
        host.logger.info(text);
        if (step.traceActivity) {
          await host.send({ type: 'trace', name: 'logStep', valueType: 'string', value: text });
        }
        advanceFrame(frame);
        return 'continue';
      }

      case 'textInput':
      case 'numberInput':
      case 'confirmInput':
      case 'choiceInput':
        return runInputStep(host, instance, frame, step);

      default: {
        const unexpected: never = step;
        throw new EvaluationError(`Unknown step kind: ${JSON.stringify(unexpected)}`);
      }
    }
  }

  private evaluateOptions(
    options: Record<string, string> | undefined,
    memory: DialogMemory,
  ): Record<string, unknown> {
    const child = new DialogMemory({ user: {}, conversation: {}, dialog: {}, turn: {}, this: {} });
    for (const [key, expression] of Object.entries(options ?? {})) {
      child.set(`dialog.${key}`, this.evaluate(expression, memory));
    }
    return child.scope('dialog');
  }

  private selectCase(step: SwitchConditionStep, value: unknown): Step[] | undefined {
    const match = step.cases.find((c) => switchCaseMatches(c.value, value));
    return match ? match.steps : step.default;
  }

  private editArray(step: EditArrayStep, memory: DialogMemory): void {
    const current = memory.get(step.itemsProperty);
    if (current !== undefined && current !== null && !Array.isArray(current)) {
      throw new EvaluationError(`'${step.itemsProperty}' is not an array`, {
        expression: step.itemsProperty,
      });
    }
    const items: unknown[] = Array.isArray(current) ? [...current] : [];
    let result: unknown;

    switch (step.changeType) {
      case 'push':
        items.push(step.value !== undefined ? this.evaluate(step.value, memory) : undefined);
        break;
      case 'pop':
        result = items.pop();
        break;
      case 'take':
        result = items.shift();
        break;
      case 'remove': {
        const target = step.value !== undefined ? this.evaluate(step.value, memory) : undefined;
        const index = items.findIndex((item) => sameValue(item, target));
        if (index >= 0) items.splice(index, 1);
        result = index >= 0;
        break;
      }
      case 'clear':
        items.length = 0;
        break;
    }

    memory.set(step.itemsProperty, items);
    if (step.resultProperty && result !== undefined) {
      memory.set(step.resultProperty, result);
    }
  }

  private startLoop(
    instance: DialogInstance,
    frame: CursorFrame,
    step: ForeachStep | ForeachPageStep,
    memory: DialogMemory,
  ): void {
    const items = memory.get(step.itemsProperty);
    if (!Array.isArray(items)) {
      throw new EvaluationError(`'${step.itemsProperty}' is not an array`, {
        expression: step.itemsProperty,
      });
    }
    advanceFrame(frame);
    if (items.length === 0 || step.steps.length === 0) return;

    const loop: LoopState =
      step.kind === 'foreach'
        ? {
            mode: 'each',
            items: structuredClone(items),
            index: 0,
            pageSize: 1,
            valueProperty: step.valueProperty ?? 'dialog.value',
            indexProperty: step.indexProperty ?? 'dialog.index',
          }
        : {
            mode: 'page',
            items: structuredClone(items),
            index: 0,
            pageSize: step.pageSize ?? DEFAULT_PAGE_SIZE,
            valueProperty: step.pageProperty ?? 'dialog.page',
            indexProperty: step.pageIndexProperty,
          };
    // Fails before the frame is pushed when the page size is bad.
    pageSlices(loop.items, loop.pageSize);
    instance.pushFrame('loop', instance.dialog.listIdOf(step.steps), loop);
    this.bindLoopPass(instance, loop);
  }

  private bindLoopPass(instance: DialogInstance, loop: LoopState): void {
    parseBindingPath(loop.valueProperty);
    if (loop.indexProperty) parseBindingPath(loop.indexProperty);
    const memory = this.host.memoryFor(instance);
    const start = loop.index * loop.pageSize;
    const value = loop.mode === 'each' ? loop.items[loop.index] : loop.items.slice(start, start + loop.pageSize);
    memory.set(loop.valueProperty, value);
    if (loop.indexProperty) {
      memory.set(loop.indexProperty, loop.index);
    }
  }

  /**
   * Called when a loop frame runs off the end of its body. Rewinds it for the
   * next element or page; returns false once the collection is exhausted.
   */
  continueLoop(instance: DialogInstance, frame: CursorFrame): boolean {
    const loop = frame.loop;
    if (!loop) return false;
    const passes = Math.ceil(loop.items.length / loop.pageSize);
    if (loop.index + 1 >= passes) return false;
    loop.index += 1;
    frame.position = 0;
    frame.stepState = {};
    this.bindLoopPass(instance, loop);
    return true;
  }

  private async editSteps(instance: DialogInstance, frame: CursorFrame, step: EditStepsStep): Promise<void> {
    const host = this.host;
    const listId = step.steps ? instance.dialog.listIdOf(step.steps) : undefined;
    switch (step.changeType) {
      case 'replaceSequence':
        host.prepareControlChange(instance);
        instance.clearCursor();
        if (listId !== undefined) instance.pushFrame('sequence', listId);
        return;
      case 'endSequence':
        host.prepareControlChange(instance);
        instance.clearCursor();
        if (instance.dialog.autoEndDialog) {
          await host.endDialog(instance, undefined);
        }
        return;
      case 'insertSteps':
        advanceFrame(frame);
        if (listId !== undefined) instance.pushFrame('sequence', listId);
        return;
      case 'appendSteps':
        advanceFrame(frame);
        if (listId !== undefined) instance.enqueueLast('sequence', listId);
        return;
    }
  }

  private traceFor(step: TraceActivityStep, memory: DialogMemory): Activity {
    if (step.valueType === 'memory') {
      return {
        type: 'trace',
        name: step.name ?? 'memory',
        valueType: 'memory',
        value: memory.snapshot(),
      };
    }
    const value = step.value !== undefined ? this.evaluate(step.value, memory) : undefined;
    return {
      type: 'trace',
      name: step.name ?? 'traceActivity',
      valueType: step.valueType ?? (value === undefined ? 'undefined' : Array.isArray(value) ? 'array' : typeof value),
      value: value === undefined ? undefined : structuredClone(value),
      text: value === undefined ? undefined : stringify(value),
    };
  }
}
