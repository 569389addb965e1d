/**
 * Module: conversation-mutex
 *
 * Per-conversation exclusive sections on top of async-mutex. Turns and
 * storage writes for the same key run one at a time; different keys never
 * wait on each other.
 */
import { Mutex } from 'async-mutex';

export class ConversationMutex {
  private readonly mutex = new Mutex();

  constructor(readonly key: string) {}

  /**
   * Run a function with the mutex locked.
   */
  async runWithLock<T>(fn: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(fn);
  }

  get isLocked(): boolean {
    return this.mutex.isLocked();
  }
}

export class ConversationLocks {
  private readonly mutexes = new Map<string, ConversationMutex>();

  getMutex(key: string): ConversationMutex {
    let mutex = this.mutexes.get(key);
    if (!mutex) {
      mutex = new ConversationMutex(key);
      this.mutexes.set(key, mutex);
    }
    return mutex;
  }

  async runWithLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    return this.getMutex(key).runWithLock(fn);
  }

  isLocked(key: string): boolean {
    return this.mutexes.get(key)?.isLocked ?? false;
  }
}
