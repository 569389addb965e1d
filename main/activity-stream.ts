/**
 * Module: activity-stream
 *
 * Outbound activities of one conversation, fanned out to subscribers.
 * Each subscription sees the activities published after it was taken, in
 * order, and buffers independently of the others.
 *
 * Ending a stream comes in two forms:
 * - `ActivityStream.close()` lets subscribers drain what was published, then ends them
 * - `ActivitySubscription.unsubscribe()` ends that subscriber at once, dropping its backlog
 */
import type { Activity } from './shared/types/activity';

/** `null` marks the end of the stream. */
type Link = Readonly<{ activity: Activity; next: Promise<Link | null> }>;

type Deferred<T> = { promise: Promise<T>; resolve: (value: T) => void };

function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

export class ActivityStream {
  private tail = deferred<Link | null>();
  private closed = false;

  constructor(readonly conversationKey: string) {}

  get isClosed(): boolean {
    return this.closed;
  }

  /** Returns false once the stream is closed; the activity goes nowhere. */
  publish(activity: Activity): boolean {
    if (this.closed) return false;
    const next = deferred<Link | null>();
    this.tail.resolve({ activity, next: next.promise });
    this.tail = next;
    return true;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.tail.resolve(null);
  }

  subscribe(): ActivitySubscription {
    return new ActivitySubscription(this.tail.promise);
  }
}

export class ActivitySubscription implements AsyncIterable<Activity> {
  private readonly stopped = deferred<null>();
  private ended = false;

  constructor(private next: Promise<Link | null>) {}

  get isEnded(): boolean {
    return this.ended;
  }

  /** The next activity, or `undefined` once the stream ended for this subscriber. */
  async read(): Promise<Activity | undefined> {
    if (this.ended) return undefined;
    const link = await Promise.race([this.stopped.promise, this.next]);
    if (!link) {
      this.ended = true;
      return undefined;
    }
    this.next = link.next;
    return link.activity;
  }

  unsubscribe(): void {
    this.ended = true;
    this.stopped.resolve(null);
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Activity, void, void> {
    for (;;) {
      const activity = await this.read();
      if (!activity) return;
      yield activity;
    }
  }
}
