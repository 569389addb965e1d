/**
 * Module: errors
 *
 * Error taxonomy raised by the engine. Everything thrown out of a turn is a
 * `TurnstackError`; callers branch on the subclass.
 */

export abstract class TurnstackError extends Error {
  abstract readonly kind: TurnstackErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type TurnstackErrorKind =
  | 'configuration'
  | 'evaluation'
  | 'transport'
  | 'dialog_execution'
  | 'turn_aborted';

/** Invalid dialog definitions, unknown memory scopes, bad engine settings. */
export class ConfigurationError extends TurnstackError {
  readonly kind = 'configuration';
}

/** Expression or memory-path failures at run time. */
export class EvaluationError extends TurnstackError {
  readonly kind = 'evaluation';
  public readonly expression?: string;

  constructor(message: string, options?: { cause?: unknown; expression?: string }) {
    super(message, options);
    this.expression = options?.expression;
  }
}

export class TransportError extends TurnstackError {
  readonly kind = 'transport';
  public readonly conversationKey: string;

  constructor(conversationKey: string, options?: { cause?: unknown }) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Failed to deliver activity for conversation '${conversationKey}'${detail}`, options);
    this.conversationKey = conversationKey;
  }
}

/**
 * A step faulted. Nothing from the turn is persisted; the conversation stays
 * at its previous snapshot.
 */
export class DialogExecutionError extends TurnstackError {
  readonly kind = 'dialog_execution';
  public readonly state = 'faulted';
  public readonly dialogId: string;
  public readonly instanceId: string;
  public readonly stepKind: string | undefined;

  constructor(
    params: Readonly<{ dialogId: string; instanceId: string; stepKind?: string; cause: unknown }>,
  ) {
    const reason = params.cause instanceof Error ? params.cause.message : String(params.cause);
    const where = params.stepKind ? ` at step '${params.stepKind}'` : '';
    super(`Dialog '${params.dialogId}' faulted${where}: ${reason}`, { cause: params.cause });
    this.dialogId = params.dialogId;
    this.instanceId = params.instanceId;
    this.stepKind = params.stepKind;
  }
}

export class TurnAbortedError extends TurnstackError {
  readonly kind = 'turn_aborted';

  constructor(reason?: unknown) {
    super('Turn aborted', { cause: reason });
  }
}

export function isTurnstackError(value: unknown): value is TurnstackError {
  return value instanceof TurnstackError;
}

export function getErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if (!('code' in error)) return undefined;
  const maybeCode = error.code;
  return typeof maybeCode === 'string' ? maybeCode : undefined;
}
