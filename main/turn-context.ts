/**
 * Module: turn-context
 *
 * Explicit state of one turn, threaded through the manager, executor and
 * bubbler instead of ambient globals.
 */
import { TurnAbortedError } from './errors';
import type { Activity } from './shared/types/activity';

export interface TurnContext {
  readonly conversationKey: string;
  readonly activity: Activity;
  readonly locale: string;
  readonly signal: AbortSignal | undefined;
  /** Persisted scopes, already copied from the loaded snapshot. */
  readonly user: Record<string, unknown>;
  readonly conversation: Record<string, unknown>;
  readonly turn: Record<string, unknown>;
  /** Set once a rule handler or a waiting input has taken the activity. */
  activityConsumed: boolean;
  readonly outbound: Activity[];
  readonly unhandledEvents: string[];
  stepCount: number;
}

export function createTurnContext(
  params: Readonly<{
    conversationKey: string;
    activity: Activity;
    locale: string;
    signal?: AbortSignal;
    user: Record<string, unknown>;
    conversation: Record<string, unknown>;
  }>,
): TurnContext {
  const activity = structuredClone(params.activity);
  return {
    conversationKey: params.conversationKey,
    activity,
    locale: params.locale,
    signal: params.signal,
    user: params.user,
    conversation: params.conversation,
    turn: {
      activity: structuredClone(activity),
      locale: params.locale,
    },
    activityConsumed: false,
    outbound: [],
    unhandledEvents: [],
    stepCount: 0,
  };
}

export function throwIfAborted(ctx: TurnContext): void {
  if (ctx.signal?.aborted) {
    throw new TurnAbortedError(ctx.signal.reason);
  }
}
