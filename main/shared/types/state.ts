/**
 * Module: shared/types/state
 *
 * Persisted conversation state and per-turn results. Everything here is plain
 * data so that storage backends can serialize it as-is.
 */
import type { Activity } from './activity';

export type FrameKind = 'sequence' | 'handler' | 'branch' | 'loop';

export type LoopState = {
  mode: 'each' | 'page';
  /** Copy of the collection taken when the loop started. */
  items: unknown[];
  /** Element (or page) index bound in the current pass. */
  index: number;
  pageSize: number;
  valueProperty: string;
  indexProperty?: string;
};

/**
 * One level of the hierarchical step cursor: a step list addressed by its id
 * in the owning dialog's list arena, and the position within it.
 */
export type CursorFrame = {
  kind: FrameKind;
  listId: number;
  position: number;
  /** Set while the step at `position` waits for a child dialog to end. */
  parked?: boolean;
  /** The `this` scope of the step at `position`. */
  stepState: Record<string, unknown>;
  loop?: LoopState;
};

export type DialogInstanceState = {
  instanceId: string;
  dialogId: string;
  /** The instance's private `dialog` scope. */
  state: Record<string, unknown>;
  /** Bottom-to-top; the last frame is the one executing. */
  cursor: CursorFrame[];
};

export const SNAPSHOT_VERSION = 1;

export type ConversationSnapshot = {
  version: typeof SNAPSHOT_VERSION;
  stack: DialogInstanceState[];
  /**
   * Index of the instance the turn stopped in, when that is not the top one:
   * a caller's rule interrupted the dialogs above it and has not finished.
   */
  activeIndex?: number;
  user: Record<string, unknown>;
  conversation: Record<string, unknown>;
  updatedAt: string;
};

export type TurnOutcome = 'suspended' | 'stackCompleted';

export type TurnResult = {
  outcome: TurnOutcome;
  /** Activities sent during the turn, in order. */
  activities: Activity[];
  /** Names of events nobody on the stack handled. */
  unhandledEvents: string[];
  stackDepth: number;
};
