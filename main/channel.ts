/**
 * Module: channel
 *
 * `ActivitySender` is how the engine hands outbound activities to a
 * transport. `InProcessChannel` is the in-memory transport used by the CLI
 * and tests: it runs one turn at a time per conversation and broadcasts
 * each outbound activity to that conversation's subscribers.
 */
import { ActivityStream, type ActivitySubscription } from './activity-stream';
import { ConversationLocks } from './conversation-mutex';
import type { DialogManager, ProcessTurnOptions } from './manager';
import type { Activity } from './shared/types/activity';
import type { TurnResult } from './shared/types/state';

export interface ActivitySender {
  send(conversationKey: string, activity: Activity): Promise<void>;
}

export class InProcessChannel implements ActivitySender {
  private readonly locks = new ConversationLocks();
  private readonly streams = new Map<string, ActivityStream>();

  constructor(private readonly manager: DialogManager) {
    manager.setSender(this);
  }

  private streamFor(conversationKey: string): ActivityStream {
    let stream = this.streams.get(conversationKey);
    if (!stream) {
      stream = new ActivityStream(conversationKey);
      this.streams.set(conversationKey, stream);
    }
    return stream;
  }

  /** Activities sent after this call, until `close` or `unsubscribe`. */
  subscribe(conversationKey: string): ActivitySubscription {
    return this.streamFor(conversationKey).subscribe();
  }

  async send(conversationKey: string, activity: Activity): Promise<void> {
    this.streamFor(conversationKey).publish(activity);
  }

  /**
   * Deliver a user activity. Turns for the same conversation queue behind
   * each other; different conversations run concurrently.
   */
  async post(conversationKey: string, activity: Activity, options?: ProcessTurnOptions): Promise<TurnResult> {
    return this.locks.runWithLock(conversationKey, () =>
      this.manager.processTurn(conversationKey, activity, options),
    );
  }

  isBusy(conversationKey: string): boolean {
    return this.locks.isLocked(conversationKey);
  }

  /**
   * End every subscriber's stream for the conversation once they have read
   * what was sent. A later `send` or `subscribe` opens a fresh stream.
   */
  close(conversationKey: string): void {
    const stream = this.streams.get(conversationKey);
    if (!stream) return;
    stream.close();
    this.streams.delete(conversationKey);
  }
}
