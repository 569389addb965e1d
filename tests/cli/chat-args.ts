import assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { InProcessChannel } from '../../main/channel';
import { readPackageVersion } from '../../main/cli';
import { formatActivity, parseChatArgs, runChatTurn } from '../../main/cli/chat';
import { TestConversation } from '../helpers/conversation';

function argParsing(): void {
  assert.deepEqual(parseChatArgs([]), {
    conversation: 'console',
    memory: false,
    printOnly: false,
    help: false,
    utterances: [],
  });

  assert.deepEqual(parseChatArgs(['-c', 'demo', '--locale', 'es-ES', '--memory', 'dialogs.yaml']), {
    dialogsPath: 'dialogs.yaml',
    conversation: 'demo',
    locale: 'es-ES',
    memory: true,
    printOnly: false,
    help: false,
    utterances: [],
  });

  const printOnly = parseChatArgs(['-p', 'dialogs.yaml', 'hi', 'Carlos']);
  assert.equal(printOnly.dialogsPath, 'dialogs.yaml');
  assert.deepEqual(printOnly.utterances, ['hi', 'Carlos']);

  assert.equal(parseChatArgs(['-s', '/tmp/state', 'd.yaml']).storageDir, '/tmp/state');
  assert.equal(parseChatArgs(['--help']).help, true);

  assert.throws(() => parseChatArgs(['--conversation']), { message: '--conversation requires an argument' });
  assert.throws(() => parseChatArgs(['--verbose']), { message: 'Unknown option: --verbose' });
  assert.throws(() => parseChatArgs(['a.yaml', 'hello']), {
    message: 'Unexpected argument: hello. Utterances need -p/--print-only.',
  });
}

function activityFormatting(): void {
  assert.equal(formatActivity({ type: 'message', text: 'Hi there' }), 'bot> Hi there');
  assert.equal(formatActivity({ type: 'message' }), 'bot> ');
  assert.equal(formatActivity({ type: 'endOfConversation' }), '[endOfConversation]');
  assert.equal(
    formatActivity({ type: 'trace', name: 'memory', value: { dialog: { n: 3 } } }),
    '[trace:memory] {"dialog":{"n":3}}',
  );
}

async function transcriptFollowsTurns(): Promise<void> {
  const conv = new TestConversation(
    [
      {
        id: 'root',
        steps: [
          { kind: 'textInput', property: 'dialog.name', prompt: 'Name?' },
          { kind: 'textInput', property: 'dialog.city', prompt: 'City?' },
          { kind: 'sendActivity', activity: 'Hi {dialog.name} from {dialog.city}' },
        ],
      },
    ],
    'root',
  );
  const channel = new InProcessChannel(conv.manager);
  const sub = channel.subscribe(conv.key);

  const transcript = await runChatTurn(channel, conv.key, { type: 'conversationUpdate' });
  for (const text of ['Ann', 'Oslo']) {
    transcript.push(`you> ${text}`);
    transcript.push(...(await runChatTurn(channel, conv.key, { type: 'message', text })));
  }
  assert.deepEqual(transcript, [
    'bot> Name?',
    'you> Ann',
    'bot> City?',
    'you> Oslo',
    'bot> Hi Ann from Oslo',
    '[endOfConversation]',
  ]);

  // Subscribers still see the same activities, the closing one included.
  channel.close(conv.key);
  const streamed: string[] = [];
  for await (const activity of sub) streamed.push(formatActivity(activity));
  assert.deepEqual(streamed, ['bot> Name?', 'bot> City?', 'bot> Hi Ann from Oslo', '[endOfConversation]']);
}

function packageVersion(): void {
  assert.equal(readPackageVersion(__dirname), '0.1.0');

  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'turnstack-version-'));
  try {
    fs.writeFileSync(path.join(dir, 'package.json'), '{"name":"unversioned"}', 'utf8');
    fs.mkdirSync(path.join(dir, 'nested'));
    assert.equal(readPackageVersion(path.join(dir, 'nested')), 'unknown');
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

async function main(): Promise<void> {
  argParsing();
  activityFormatting();
  packageVersion();
  await transcriptFollowsTurns();
  console.log('chat cli tests: ok');
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
