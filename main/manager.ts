/**
 * Module: manager
 *
 * `DialogManager.processTurn` loads a conversation, drives its dialog stack
 * until the stack waits for input or empties, and saves the result. A turn
 * that throws saves nothing, so the stored snapshot is always the last one a
 * turn completed.
 *
 * `TurnRunner` is the per-turn engine behind it. It owns the stack while the
 * turn runs and implements the control operations steps ask for.
 */
import type { ActivitySender } from './channel';
import { resolveEngineConfig, type EngineConfig } from './config';
import type { DialogSet } from './dialog';
import { advanceFrame, DialogStack, type DialogInstance } from './dialog-stack';
import { EventBubbler } from './bubbler';
import {
  ConfigurationError,
  DialogExecutionError,
  TransportError,
  TurnAbortedError,
} from './errors';
import { DefaultExpressionEvaluator, type ExpressionEvaluator } from './expr/evaluate';
import { StepExecutor, type DialogCaller, type ExecutionHost } from './executor';
import { isAwaitingInput } from './inputs';
import { TemplateLanguageGenerator, type LanguageGenerator } from './lg';
import { createLogger, type Logger } from './log';
import { selectRule, type RuleMatch } from './matcher';
import { DialogMemory } from './memory';
import type { ConversationStorage } from './persistence';
import { NONE_INTENT } from './recognizers';
import { DialogEvents, type Activity, type DialogEvent, type RecognizerResult } from './shared/types/activity';
import {
  SNAPSHOT_VERSION,
  type ConversationSnapshot,
  type CursorFrame,
  type TurnOutcome,
  type TurnResult,
} from './shared/types/state';
import { createTurnContext, throwIfAborted, type TurnContext } from './turn-context';
import { generateActivityId } from './utils/id';

type RunnerDeps = Readonly<{
  evaluator: ExpressionEvaluator;
  languageGenerator: LanguageGenerator;
  config: EngineConfig;
  logger: Logger;
  sender: ActivitySender | undefined;
}>;

function passesThrough(error: unknown): boolean {
  return (
    error instanceof DialogExecutionError ||
    error instanceof TurnAbortedError ||
    error instanceof TransportError ||
    error instanceof ConfigurationError
  );
}

export class TurnRunner implements ExecutionHost {
  readonly evaluator: ExpressionEvaluator;
  readonly languageGenerator: LanguageGenerator;
  readonly config: EngineConfig;
  readonly logger: Logger;
  private readonly sender: ActivitySender | undefined;
  private readonly executor: StepExecutor;
  private readonly bubbler: EventBubbler;
  /** How each instance saw this turn's activity. */
  private readonly activityEvents = new Map<DialogInstance, DialogEvent>();
  private activeIndex = -1;

  constructor(
    readonly ctx: TurnContext,
    private readonly stack: DialogStack,
    deps: RunnerDeps,
  ) {
    this.evaluator = deps.evaluator;
    this.languageGenerator = deps.languageGenerator;
    this.config = deps.config;
    this.logger = deps.logger;
    this.sender = deps.sender;
    this.executor = new StepExecutor(this);
    this.bubbler = new EventBubbler(deps.evaluator, deps.logger);
  }

  /**
   * `resumeIndex` names the instance the previous turn stopped in. It is only
   * set when a caller's handler suspended below the top of the stack.
   */
  async run(rootDialogId: string, rootScope: Record<string, unknown> = {}, resumeIndex?: number): Promise<TurnOutcome> {
    throwIfAborted(this.ctx);
    if (this.stack.depth === 0) {
      await this.beginDialog(rootDialogId, structuredClone(rootScope));
    } else {
      const start =
        resumeIndex !== undefined && resumeIndex < this.stack.topIndex ? resumeIndex : this.stack.topIndex;
      await this.dispatchActivity(start);
    }
    return this.drive();
  }

  /** Index to resume from next turn, when the turn stopped below the top of the stack. */
  get suspendedBelowTop(): number | undefined {
    return this.activeIndex >= 0 && this.activeIndex < this.stack.topIndex ? this.activeIndex : undefined;
  }

  // ---------------------------------------------------------------------------
  // Activity routing
  // ---------------------------------------------------------------------------

  /**
   * Offer the activity to the instance at `startIndex`, then to its callers.
   * That is the top of the stack unless a caller's handler is still running.
   */
  private async dispatchActivity(startIndex: number): Promise<void> {
    const top = this.stack.at(startIndex);
    if (!top) return;
    this.activeIndex = startIndex;

    if (await this.offerActivity(top, startIndex)) return;

    const awaitingInput = isAwaitingInput(top);
    if (top.pending && !awaitingInput) {
      // Resuming queued steps takes the activity.
      this.ctx.activityConsumed = true;
      return;
    }

    // Callers get a chance to interrupt; a waiting input keeps the activity otherwise.
    const name = (await this.eventForActivity(top)).name;
    const outcome = await this.guard(top, undefined, () =>
      this.bubbler.bubble(this.stack, startIndex - 1, {
        name,
        eventFor: (instance) => this.eventForActivity(instance),
        memoryFor: (instance) => this.memoryFor(instance),
      }),
    );
    if (outcome.consumed) {
      const target = this.stack.at(outcome.index);
      if (!target) return;
      this.pushHandler(target, outcome.match, outcome.event);
      this.ctx.activityConsumed = true;
      this.activeIndex = outcome.index;
      return;
    }
    if (!awaitingInput) this.recordUnhandled(name);
  }

  private recordUnhandled(name: string): void {
    this.logger.warn(`Event '${name}' bubbled to the root without being handled`);
    this.ctx.unhandledEvents.push(name);
  }

  /** Run the instance's best rule for this turn's activity, if it has one. */
  private async offerActivity(instance: DialogInstance, index: number): Promise<boolean> {
    const event = await this.eventForActivity(instance);
    const match = await this.select(instance, event);
    if (!match) return false;
    this.pushHandler(instance, match, event);
    this.ctx.activityConsumed = true;
    this.activeIndex = index;
    return true;
  }

  private async eventForActivity(instance: DialogInstance): Promise<DialogEvent> {
    const cached = this.activityEvents.get(instance);
    if (cached) return structuredClone(cached);

    const activity = this.ctx.activity;
    let event: DialogEvent;
    switch (activity.type) {
      case 'message': {
        const result = await this.recognize(instance, activity.text ?? '');
        const confident = result.intent !== NONE_INTENT && result.score >= this.config.minIntentScore;
        event = {
          name: confident ? DialogEvents.recognizedIntent : DialogEvents.unknownIntent,
          value: result,
          bubble: true,
        };
        break;
      }
      case 'event':
        event = { name: activity.name ?? 'event', value: activity.value, bubble: true };
        break;
      default:
        event = { name: DialogEvents.activityReceived, value: structuredClone(activity), bubble: true };
        break;
    }
    this.activityEvents.set(instance, event);
    return structuredClone(event);
  }

  private async recognize(instance: DialogInstance, text: string): Promise<RecognizerResult> {
    const recognizer = instance.dialog.recognizer;
    if (!recognizer) return { text, intent: NONE_INTENT, score: 0, entities: {} };
    const result = await this.guard(instance, undefined, () => recognizer.recognize(text, this.ctx.locale));
    throwIfAborted(this.ctx);
    return result;
  }

  private async select(instance: DialogInstance, event: DialogEvent): Promise<RuleMatch | undefined> {
    return this.guard(instance, undefined, async () =>
      selectRule(instance.dialog.rules, event, this.memoryFor(instance), this.evaluator, {
        excludeCatchAll: instance.pending,
      }),
    );
  }

  private pushHandler(instance: DialogInstance, match: RuleMatch, event: DialogEvent): void {
    instance.pushFrame('handler', instance.dialog.ruleListId(match.index));
    this.ctx.turn.dialogEvent = structuredClone({ name: event.name, value: event.value });
    if (event.name === DialogEvents.recognizedIntent || event.name === DialogEvents.unknownIntent) {
      this.ctx.turn.recognized = structuredClone(event.value);
    }
    this.logger.debug(
      `Dialog '${instance.dialogId}' handles '${event.name}' with rule #${match.index} (${match.rule.trigger.kind})`,
    );
  }

  // ---------------------------------------------------------------------------
  // Drive loop
  // ---------------------------------------------------------------------------

  private async drive(): Promise<TurnOutcome> {
    for (;;) {
      throwIfAborted(this.ctx);
      if (this.stack.depth === 0) return 'stackCompleted';
      if (this.activeIndex < 0 || this.activeIndex > this.stack.topIndex) {
        this.activeIndex = this.stack.topIndex;
      }
      const active = this.stack.at(this.activeIndex);
      if (!active) return 'stackCompleted';

      const frame = active.topFrame();
      if (!frame) {
        if (this.activeIndex < this.stack.topIndex) {
          this.activeIndex = this.stack.topIndex;
          continue;
        }
        return 'suspended';
      }

      const step = active.currentStep();
      if (!step) {
        const looped =
          frame.kind === 'loop' &&
          (await this.guard(active, 'foreach', async () => this.executor.continueLoop(active, frame)));
        if (looped) continue;
        active.cursor.pop();
        if (!active.pending && active.dialog.autoEndDialog) {
          await this.guard(active, undefined, () => this.endDialog(active, undefined));
        }
        continue;
      }

      if (frame.parked) {
        if (this.activeIndex < this.stack.topIndex) {
          this.activeIndex = this.stack.topIndex;
        } else {
          // The dialog it began is gone; carry on after the begin step.
          advanceFrame(frame);
        }
        continue;
      }

      this.ctx.stepCount += 1;
      if (this.ctx.stepCount > this.config.maxStepsPerTurn) {
        throw new DialogExecutionError({
          dialogId: active.dialogId,
          instanceId: active.instanceId,
          stepKind: step.kind,
          cause: new Error(`Turn exceeded ${this.config.maxStepsPerTurn} steps`),
        });
      }

      const signal = await this.guard(active, step.kind, () => this.executor.execute(active, frame, step));
      if (signal === 'suspend') return 'suspended';
    }
  }

  private async guard<T>(instance: DialogInstance, stepKind: string | undefined, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (passesThrough(error)) throw error;
      throw new DialogExecutionError({
        dialogId: instance.dialogId,
        instanceId: instance.instanceId,
        stepKind,
        cause: error,
      });
    }
  }

  // ---------------------------------------------------------------------------
  // ExecutionHost
  // ---------------------------------------------------------------------------

  memoryFor(instance: DialogInstance, frame?: CursorFrame): DialogMemory {
    return new DialogMemory({
      user: this.ctx.user,
      conversation: this.ctx.conversation,
      turn: this.ctx.turn,
      dialog: instance.state.state,
      this: frame ? frame.stepState : {},
    });
  }

  async send(activity: Activity): Promise<void> {
    const outgoing: Activity = {
      ...activity,
      id: generateActivityId(),
      timestamp: new Date().toISOString(),
      locale: activity.locale ?? this.ctx.locale,
    };
    this.ctx.outbound.push(outgoing);
    if (!this.sender) return;
    try {
      await this.sender.send(this.ctx.conversationKey, outgoing);
    } catch (error) {
      if (error instanceof TransportError) throw error;
      throw new TransportError(this.ctx.conversationKey, { cause: error });
    }
  }

  prepareControlChange(instance: DialogInstance): void {
    const index = this.stack.indexOf(instance);
    if (index < 0) {
      throw new Error(`Dialog '${instance.dialogId}' (${instance.instanceId}) is no longer on the stack`);
    }
    if (index < this.stack.topIndex) {
      const cancelled = this.stack.truncateAbove(index);
      for (const gone of cancelled) this.activityEvents.delete(gone);
      this.logger.debug(
        `Cancelled ${cancelled.map((gone) => `'${gone.dialogId}'`).join(', ')} above '${instance.dialogId}'`,
      );
    }
    this.activeIndex = index;
  }

  suspendIn(instance: DialogInstance): void {
    const index = this.stack.indexOf(instance);
    if (index < 0) {
      throw new Error(`Dialog '${instance.dialogId}' (${instance.instanceId}) is no longer on the stack`);
    }
    this.activeIndex = index;
  }

  async beginDialog(dialogId: string, scope: Record<string, unknown>, caller?: DialogCaller): Promise<void> {
    if (caller) {
      this.prepareControlChange(caller.instance);
      caller.frame.parked = true;
    }
    const child = this.stack.push(dialogId, scope);
    this.activeIndex = this.stack.topIndex;
    this.logger.debug(`Began dialog '${dialogId}' (${child.instanceId}) at depth ${this.activeIndex}`);
    // A dialog made only of rules reacts to the activity that started it.
    if (!child.pending) {
      await this.offerActivity(child, this.activeIndex);
    }
  }

  async replaceDialog(instance: DialogInstance, dialogId: string, scope: Record<string, unknown>): Promise<void> {
    this.prepareControlChange(instance);
    this.stack.pop();
    this.activityEvents.delete(instance);
    this.logger.debug(`Dialog '${instance.dialogId}' replaced by '${dialogId}'`);
    await this.beginDialog(dialogId, scope);
  }

  async endDialog(instance: DialogInstance, result: unknown): Promise<void> {
    this.prepareControlChange(instance);
    this.stack.pop();
    this.activityEvents.delete(instance);
    this.logger.debug(`Ended dialog '${instance.dialogId}' (${instance.instanceId})`);

    const parent = this.stack.top();
    if (!parent) {
      this.activeIndex = -1;
      return;
    }
    this.activeIndex = this.stack.topIndex;
    const frame = parent.topFrame();
    if (!frame?.parked) return;
    const step = parent.currentStep();
    if (step?.kind === 'beginDialog' && step.resultProperty !== undefined && result !== undefined) {
      this.memoryFor(parent, frame).set(step.resultProperty, result);
    }
    advanceFrame(frame);
  }

  repeatDialog(instance: DialogInstance): void {
    this.prepareControlChange(instance);
    instance.restart();
    this.logger.debug(`Repeating dialog '${instance.dialogId}'`);
  }

  cancelAllDialogs(): void {
    this.logger.debug(`Cancelling all ${this.stack.depth} dialog(s)`);
    this.stack.clear();
    this.activityEvents.clear();
    this.activeIndex = -1;
  }

  async emitEvent(instance: DialogInstance, event: DialogEvent): Promise<void> {
    const index = this.stack.indexOf(instance);
    const local = await this.select(instance, structuredClone(event));
    if (local) {
      this.pushHandler(instance, local, event);
      this.activeIndex = index;
      return;
    }
    if (!event.bubble) {
      this.logger.debug(`Event '${event.name}' not handled by dialog '${instance.dialogId}'`);
      this.ctx.unhandledEvents.push(event.name);
      return;
    }
    const outcome = await this.bubbler.bubble(this.stack, index - 1, {
      name: event.name,
      eventFor: async () => structuredClone(event),
      memoryFor: (candidate) => this.memoryFor(candidate),
    });
    if (!outcome.consumed) {
      this.recordUnhandled(event.name);
      return;
    }
    const target = this.stack.at(outcome.index);
    if (!target) return;
    this.pushHandler(target, outcome.match, outcome.event);
    this.activeIndex = outcome.index;
  }
}

export type DialogManagerOptions = Readonly<{
  dialogs: DialogSet;
  rootDialogId: string;
  storage: ConversationStorage;
  evaluator?: ExpressionEvaluator;
  languageGenerator?: LanguageGenerator;
  config?: Partial<EngineConfig>;
  logger?: Logger;
  /** Receives each outbound activity as it is produced. */
  sender?: ActivitySender;
  /** Check every dialog up front. Defaults to true. */
  validate?: boolean;
}>;

export type ProcessTurnOptions = Readonly<{
  signal?: AbortSignal;
  /** `dialog` scope for the root dialog when the turn has to begin it. */
  rootOptions?: Record<string, unknown>;
}>;

export class DialogManager {
  readonly dialogs: DialogSet;
  readonly rootDialogId: string;
  readonly config: EngineConfig;
  private readonly storage: ConversationStorage;
  private readonly evaluator: ExpressionEvaluator;
  private readonly languageGenerator: LanguageGenerator;
  private readonly logger: Logger;
  private sender: ActivitySender | undefined;

  constructor(options: DialogManagerOptions) {
    this.dialogs = options.dialogs;
    this.rootDialogId = options.rootDialogId;
    this.storage = options.storage;
    this.config = resolveEngineConfig(options.config);
    this.evaluator = options.evaluator ?? new DefaultExpressionEvaluator();
    this.languageGenerator = options.languageGenerator ?? new TemplateLanguageGenerator(this.evaluator);
    this.logger = options.logger ?? createLogger('dialog-manager');
    this.sender = options.sender;
    if (options.validate ?? true) {
      this.dialogs.validate(
        { evaluator: this.evaluator, languageGenerator: this.languageGenerator },
        this.rootDialogId,
      );
    } else {
      this.dialogs.get(this.rootDialogId);
    }
  }

  setSender(sender: ActivitySender | undefined): void {
    this.sender = sender;
  }

  async processTurn(conversationKey: string, activity: Activity, options?: ProcessTurnOptions): Promise<TurnResult> {
    const loaded = await this.storage.load(conversationKey);
    const snapshot = loaded ? structuredClone(loaded) : undefined;
    const ctx = createTurnContext({
      conversationKey,
      activity,
      locale: activity.locale ?? this.config.defaultLocale,
      signal: options?.signal,
      user: snapshot?.user ?? {},
      conversation: snapshot?.conversation ?? {},
    });
    const stack = new DialogStack(this.dialogs, snapshot?.stack ?? []);
    const runner = new TurnRunner(ctx, stack, {
      evaluator: this.evaluator,
      languageGenerator: this.languageGenerator,
      config: this.config,
      logger: this.logger,
      sender: this.sender,
    });

    this.logger.debug(
      `Turn started for '${conversationKey}' (${activity.type}, stack depth ${stack.depth})`,
    );
    let outcome: TurnOutcome;
    try {
      outcome = await runner.run(this.rootDialogId, options?.rootOptions, snapshot?.activeIndex);
      throwIfAborted(ctx);
    } catch (error) {
      if (error instanceof TurnAbortedError) {
        this.logger.info(`Turn for '${conversationKey}' aborted; nothing saved`);
      } else {
        this.logger.error(`Turn for '${conversationKey}' failed; nothing saved`, error);
      }
      throw error;
    }

    const next: ConversationSnapshot = {
      version: SNAPSHOT_VERSION,
      stack: outcome === 'stackCompleted' ? [] : stack.toState(),
      user: ctx.user,
      conversation: ctx.conversation,
      updatedAt: new Date().toISOString(),
    };
    const resumeAt = outcome === 'suspended' ? runner.suspendedBelowTop : undefined;
    if (resumeAt !== undefined) next.activeIndex = resumeAt;
    await this.storage.save(conversationKey, next);

    this.logger.debug(
      `Turn finished for '${conversationKey}': ${outcome}, ${ctx.outbound.length} activit(ies), depth ${stack.depth}`,
    );
    return {
      outcome,
      activities: ctx.outbound,
      unhandledEvents: ctx.unhandledEvents,
      stackDepth: stack.depth,
    };
  }

  async getSnapshot(conversationKey: string): Promise<ConversationSnapshot | undefined> {
    return this.storage.load(conversationKey);
  }

  async resetConversation(conversationKey: string): Promise<void> {
    await this.storage.delete(conversationKey);
    this.logger.debug(`Conversation '${conversationKey}' reset`);
  }
}
