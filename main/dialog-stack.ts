/**
 * Module: dialog-stack
 *
 * `DialogInstance` wraps one persisted instance state with its compiled
 * dialog; `DialogStack` is the per-conversation LIFO of instances.
 */
import type { CompiledDialog, DialogSet } from './dialog';
import { ConfigurationError } from './errors';
import type { CursorFrame, DialogInstanceState, FrameKind, LoopState } from './shared/types/state';
import type { Step } from './shared/types/steps';
import { generateInstanceId } from './utils/id';

export class DialogInstance {
  constructor(
    readonly dialog: CompiledDialog,
    readonly state: DialogInstanceState,
  ) {}

  get instanceId(): string {
    return this.state.instanceId;
  }

  get dialogId(): string {
    return this.state.dialogId;
  }

  get cursor(): CursorFrame[] {
    return this.state.cursor;
  }

  /** True while the instance has queued steps, including a parked begin. */
  get pending(): boolean {
    return this.state.cursor.length > 0;
  }

  topFrame(): CursorFrame | undefined {
    return this.state.cursor[this.state.cursor.length - 1];
  }

  /** Step under the top frame, or undefined when that list is exhausted. */
  currentStep(): Step | undefined {
    const frame = this.topFrame();
    if (!frame) return undefined;
    return this.dialog.list(frame.listId)[frame.position];
  }

  pushFrame(kind: FrameKind, listId: number, loop?: LoopState): CursorFrame {
    const frame: CursorFrame = { kind, listId, position: 0, stepState: {} };
    if (loop) frame.loop = loop;
    this.state.cursor.push(frame);
    return frame;
  }

  /** Queue a list to run after everything already queued. */
  enqueueLast(kind: FrameKind, listId: number): void {
    this.state.cursor.unshift({ kind, listId, position: 0, stepState: {} });
  }

  clearCursor(): void {
    this.state.cursor.length = 0;
  }

  /** Restart from the initial steps; the dialog scope is kept. */
  restart(): void {
    this.clearCursor();
    if (this.dialog.initialListId !== undefined) {
      this.pushFrame('sequence', this.dialog.initialListId);
    }
  }
}

/** Move past the step under `frame`, dropping that step's `this` state. */
export function advanceFrame(frame: CursorFrame): void {
  frame.position += 1;
  delete frame.parked;
  frame.stepState = {};
}

export class DialogStack {
  private readonly instances: DialogInstance[];

  constructor(
    private readonly dialogs: DialogSet,
    states: ReadonlyArray<DialogInstanceState> = [],
  ) {
    this.instances = states.map((state) => this.hydrate(state));
  }

  private hydrate(state: DialogInstanceState): DialogInstance {
    const dialog = this.dialogs.get(state.dialogId);
    for (const frame of state.cursor) {
      if (frame.listId < 0 || frame.listId >= dialog.listCount) {
        throw new ConfigurationError(
          `Stored cursor of dialog '${state.dialogId}' points at list #${frame.listId}, which no longer exists`,
        );
      }
    }
    return new DialogInstance(dialog, state);
  }

  get depth(): number {
    return this.instances.length;
  }

  get topIndex(): number {
    return this.instances.length - 1;
  }

  at(index: number): DialogInstance | undefined {
    return this.instances[index];
  }

  top(): DialogInstance | undefined {
    return this.instances[this.instances.length - 1];
  }

  indexOf(instance: DialogInstance): number {
    return this.instances.indexOf(instance);
  }

  /**
   * Push a fresh instance. The cursor starts on the initial steps when the
   * dialog has any; otherwise the instance waits for rules to fire.
   */
  push(dialogId: string, scope: Record<string, unknown> = {}): DialogInstance {
    const instance = new DialogInstance(this.dialogs.get(dialogId), {
      instanceId: generateInstanceId(),
      dialogId,
      state: scope,
      cursor: [],
    });
    instance.restart();
    this.instances.push(instance);
    return instance;
  }

  pop(): DialogInstance | undefined {
    return this.instances.pop();
  }

  /** Drop every instance above `index`, newest first. */
  truncateAbove(index: number): DialogInstance[] {
    return this.instances.splice(index + 1).reverse();
  }

  clear(): void {
    this.instances.length = 0;
  }

  toState(): DialogInstanceState[] {
    return this.instances.map((instance) => instance.state);
  }
}
