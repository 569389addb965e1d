/**
 * Module: persistence
 *
 * Conversation snapshot storage.
 * - `ConversationStorage`: the contract the dialog manager depends on
 * - `MemoryStorage`: in-process map, for tests and single-process runs
 * - `DiskFileStorage`: one YAML file per conversation, written atomically
 */

import * as fs from 'fs';
import { randomUUID } from 'node:crypto';
import * as path from 'path';
import * as yaml from 'yaml';
import { ConversationLocks } from './conversation-mutex';
import { ConfigurationError, getErrorCode } from './errors';
import { createLogger } from './log';
import { isRecord } from './memory';
import {
  SNAPSHOT_VERSION,
  type ConversationSnapshot,
  type CursorFrame,
  type DialogInstanceState,
} from './shared/types/state';
import { conversationFileName } from './utils/id';

const log = createLogger('persistence');

export interface ConversationStorage {
  load(key: string): Promise<ConversationSnapshot | undefined>;
  /** Replaces the stored snapshot as one unit. */
  save(key: string, snapshot: ConversationSnapshot): Promise<void>;
  delete(key: string): Promise<void>;
}

function isCursorFrame(value: unknown): value is CursorFrame {
  if (!isRecord(value)) return false;
  if (
    value.kind !== 'sequence' &&
    value.kind !== 'handler' &&
    value.kind !== 'branch' &&
    value.kind !== 'loop'
  ) {
    return false;
  }
  if (typeof value.listId !== 'number' || typeof value.position !== 'number') return false;
  if (value.parked !== undefined && typeof value.parked !== 'boolean') return false;
  if (!isRecord(value.stepState)) return false;
  if (value.loop !== undefined) {
    const loop = value.loop;
    if (!isRecord(loop)) return false;
    if (loop.mode !== 'each' && loop.mode !== 'page') return false;
    if (!Array.isArray(loop.items)) return false;
    if (typeof loop.index !== 'number' || typeof loop.pageSize !== 'number') return false;
    if (typeof loop.valueProperty !== 'string') return false;
    if (loop.indexProperty !== undefined && typeof loop.indexProperty !== 'string') return false;
  }
  return true;
}

function isDialogInstanceState(value: unknown): value is DialogInstanceState {
  if (!isRecord(value)) return false;
  if (typeof value.instanceId !== 'string' || typeof value.dialogId !== 'string') return false;
  if (!isRecord(value.state)) return false;
  return Array.isArray(value.cursor) && value.cursor.every(isCursorFrame);
}

export function isConversationSnapshot(value: unknown): value is ConversationSnapshot {
  if (!isRecord(value)) return false;
  if (value.version !== SNAPSHOT_VERSION) return false;
  if (!Array.isArray(value.stack) || !value.stack.every(isDialogInstanceState)) return false;
  if (
    value.activeIndex !== undefined &&
    (typeof value.activeIndex !== 'number' || !Number.isInteger(value.activeIndex) || value.activeIndex < 0)
  ) {
    return false;
  }
  if (!isRecord(value.user) || !isRecord(value.conversation)) return false;
  return typeof value.updatedAt === 'string';
}

export class MemoryStorage implements ConversationStorage {
  private readonly snapshots = new Map<string, ConversationSnapshot>();

  async load(key: string): Promise<ConversationSnapshot | undefined> {
    const stored = this.snapshots.get(key);
    return stored ? structuredClone(stored) : undefined;
  }

  async save(key: string, snapshot: ConversationSnapshot): Promise<void> {
    this.snapshots.set(key, structuredClone(snapshot));
  }

  async delete(key: string): Promise<void> {
    this.snapshots.delete(key);
  }

  keys(): string[] {
    return [...this.snapshots.keys()];
  }
}

export class DiskFileStorage implements ConversationStorage {
  private readonly locks = new ConversationLocks();

  constructor(readonly rootDir: string) {}

  filePathFor(key: string): string {
    return path.join(this.rootDir, `${conversationFileName(key)}.yaml`);
  }

  async load(key: string): Promise<ConversationSnapshot | undefined> {
    const filePath = this.filePathFor(key);
    return this.locks.runWithLock(key, async () => {
      let content: string;
      try {
        content = await fs.promises.readFile(filePath, 'utf-8');
      } catch (error) {
        if (getErrorCode(error) === 'ENOENT') return undefined;
        throw error;
      }
      const parsed: unknown = yaml.parse(content);
      if (!isConversationSnapshot(parsed)) {
        throw new ConfigurationError(`Stored conversation '${key}' at ${filePath} is malformed`);
      }
      return parsed;
    });
  }

  async save(key: string, snapshot: ConversationSnapshot): Promise<void> {
    const filePath = this.filePathFor(key);
    await this.locks.runWithLock(key, async () => {
      await fs.promises.mkdir(this.rootDir, { recursive: true });
      const yamlContent = yaml.stringify(snapshot);
      const tempFile = path.join(
        this.rootDir,
        `.${path.basename(filePath)}.${process.pid}.${randomUUID()}.tmp`,
      );
      await fs.promises.writeFile(tempFile, yamlContent, 'utf-8');
      await DiskFileStorage.renameWithRetry(tempFile, filePath, yamlContent);
    });
  }

  async delete(key: string): Promise<void> {
    const filePath = this.filePathFor(key);
    await this.locks.runWithLock(key, async () => {
      await fs.promises.rm(filePath, { force: true });
    });
  }

  private static async renameWithRetry(
    source: string,
    destination: string,
    yamlContent: string,
    maxRetries: number = 5,
  ): Promise<void> {
    const destinationDir = path.dirname(destination);

    for (let attempt = 1; ; attempt++) {
      try {
        await fs.promises.mkdir(destinationDir, { recursive: true });
        try {
          await fs.promises.access(source);
        } catch {
          // Temp file vanished; write it again before renaming.
          await fs.promises.writeFile(source, yamlContent, 'utf-8');
        }
        await fs.promises.rename(source, destination);
        return;
      } catch (error) {
        if (getErrorCode(error) !== 'ENOENT' || attempt >= maxRetries) {
          throw error;
        }
        log.debug(`Retrying rename of ${path.basename(source)} (attempt ${attempt})`);
        await new Promise((resolve) => setTimeout(resolve, 20 * attempt));
      }
    }
  }
}
