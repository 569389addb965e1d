/**
 * chat subcommand for turnstack CLI
 *
 * Usage:
 *   turnstack chat [options] <dialogs.yaml> [-p utterances...]
 *
 * Options:
 *   -c, --conversation <id>: Conversation key (default: console)
 *   -l, --locale <code>: Locale sent with every activity
 *   -s, --storage <dir>: Directory for conversation snapshots
 *   --memory: Keep conversation state in memory only
 *   -p, --print-only: Non-interactive mode; remaining arguments are utterances
 *   --help: Show help message
 */

import * as readline from 'readline';
import { InProcessChannel } from '../channel';
import { loadEngineConfig } from '../config';
import { loadDialogsFile } from '../declarative';
import { log } from '../log';
import { DialogManager } from '../manager';
import { DiskFileStorage, MemoryStorage, type ConversationStorage } from '../persistence';
import type { Activity } from '../shared/types/activity';

export type ChatArgs = {
  dialogsPath?: string;
  conversation: string;
  locale?: string;
  storageDir?: string;
  memory: boolean;
  printOnly: boolean;
  help: boolean;
  utterances: string[];
};

function showHelp(): void {
  console.log('Usage: turnstack chat [options] <dialogs.yaml> [-p utterances...]');
  console.log('');
  console.log('Hold a conversation with the root dialog of a dialogs file.');
  console.log('Type /reset to start over and /quit (or Ctrl-D) to leave.');
  console.log('');
  console.log('Options:');
  console.log('  -c, --conversation <id>   Conversation key (default: console)');
  console.log('  -l, --locale <code>       Locale sent with every activity');
  console.log('  -s, --storage <dir>       Directory for conversation snapshots');
  console.log('  --memory                  Keep conversation state in memory only');
  console.log('  -p, --print-only          Non-interactive; remaining arguments are utterances');
  console.log('  --help                    Show this help message');
}

export function parseChatArgs(argv: ReadonlyArray<string>): ChatArgs {
  const out: ChatArgs = {
    conversation: 'console',
    memory: false,
    printOnly: false,
    help: false,
    utterances: [],
  };

  const valueOf = (flag: string, i: number): string => {
    const next = argv[i + 1];
    if (next === undefined) {
      throw new Error(`${flag} requires an argument`);
    }
    return next;
  };

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (out.printOnly && out.dialogsPath !== undefined && !a.startsWith('-')) {
      out.utterances.push(a);
      continue;
    }
    if (a === '-c' || a === '--conversation') {
      out.conversation = valueOf(a, i);
      i++;
      continue;
    }
    if (a === '-l' || a === '--locale') {
      out.locale = valueOf(a, i);
      i++;
      continue;
    }
    if (a === '-s' || a === '--storage') {
      out.storageDir = valueOf(a, i);
      i++;
      continue;
    }
    if (a === '--memory') {
      out.memory = true;
      continue;
    }
    if (a === '-p' || a === '--print-only') {
      out.printOnly = true;
      continue;
    }
    if (a === '--help' || a === '-h') {
      out.help = true;
      continue;
    }
    if (a.startsWith('-')) {
      throw new Error(`Unknown option: ${a}`);
    }
    if (out.dialogsPath === undefined) {
      out.dialogsPath = a;
      continue;
    }
    if (!out.printOnly) {
      throw new Error(`Unexpected argument: ${a}. Utterances need -p/--print-only.`);
    }
    out.utterances.push(a);
  }
  return out;
}

export function formatActivity(activity: Activity): string {
  if (activity.type === 'message') return `bot> ${activity.text ?? ''}`;
  const value = activity.value === undefined ? '' : ` ${JSON.stringify(activity.value)}`;
  return `[${activity.type}${activity.name ? `:${activity.name}` : ''}]${value}`;
}

/**
 * Post one activity and return the lines to print for it, in the order the
 * turn produced them. A finished conversation ends with `endOfConversation`.
 */
export async function runChatTurn(channel: InProcessChannel, key: string, input: Activity): Promise<string[]> {
  const result = await channel.post(key, input);
  const shown = [...result.activities];
  if (result.outcome === 'stackCompleted') {
    const end: Activity = { type: 'endOfConversation' };
    await channel.send(key, end);
    shown.push(end);
  }
  return shown.map(formatActivity);
}

export async function main(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<void> {
  let args: ChatArgs;
  try {
    args = parseChatArgs(argv);
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
    return;
  }
  if (args.help) {
    showHelp();
    return;
  }
  if (args.dialogsPath === undefined) {
    console.error('Error: chat requires a dialogs file');
    process.exitCode = 1;
    return;
  }

  const config = loadEngineConfig(env, args.storageDir ? { storageDir: args.storageDir } : undefined);
  const loaded = await loadDialogsFile(args.dialogsPath);
  const storage: ConversationStorage = args.memory ? new MemoryStorage() : new DiskFileStorage(config.storageDir);
  const manager = new DialogManager({
    dialogs: loaded.dialogSet,
    rootDialogId: loaded.rootDialogId,
    storage,
    config,
  });
  const channel = new InProcessChannel(manager);
  const key = args.conversation;

  const activity = (partial: Activity): Activity =>
    args.locale ? { ...partial, locale: args.locale } : partial;

  const post = async (input: Activity): Promise<boolean> => {
    try {
      for (const line of await runChatTurn(channel, key, activity(input))) {
        console.log(line);
      }
      return true;
    } catch (error) {
      log.error(`Turn failed`, error);
      process.exitCode = 1;
      return false;
    }
  };

  const existing = await manager.getSnapshot(key);
  if (!existing || existing.stack.length === 0) {
    await post({ type: 'conversationUpdate' });
  }

  if (args.printOnly) {
    for (const text of args.utterances) {
      console.log(`you> ${text}`);
      if (!(await post({ type: 'message', text }))) break;
    }
  } else {
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: 'you> ' });
    rl.prompt();
    for await (const line of rl) {
      const text = line.trim();
      if (text === '/quit') break;
      if (text === '/reset') {
        await manager.resetConversation(key);
        await post({ type: 'conversationUpdate' });
      } else if (text) {
        await post({ type: 'message', text });
      }
      rl.prompt();
    }
    rl.close();
  }

  channel.close(key);
}
