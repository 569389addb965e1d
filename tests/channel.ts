/**
 * InProcessChannel: per-conversation turn ordering and subscriber streams.
 */

import assert from 'node:assert/strict';
import { ActivityStream, type ActivitySubscription } from '../main/activity-stream';
import { InProcessChannel } from '../main/channel';
import type { DialogDefinition } from '../main/dialog';
import type { Activity } from '../main/shared/types/activity';
import { TestConversation, texts } from './helpers/conversation';

const greeting: DialogDefinition[] = [
  {
    id: 'root',
    steps: [
      { kind: 'textInput', property: 'dialog.name', prompt: 'Name?' },
      { kind: 'sendActivity', activity: 'Hi {dialog.name}' },
    ],
  },
];

async function collect(sub: ActivitySubscription): Promise<string[]> {
  const seen: string[] = [];
  for await (const activity of sub) {
    seen.push(activity.type === 'message' ? (activity.text ?? '') : `[${activity.type}]`);
  }
  return seen;
}

async function turnsRunInOrder(): Promise<void> {
  const conv = new TestConversation(greeting, 'root');
  const channel = new InProcessChannel(conv.manager);
  const sub = channel.subscribe(conv.key);
  const printed = collect(sub);

  assert.equal(channel.isBusy(conv.key), false);
  // Posted back to back: the second turn sees the input the first one opened.
  const [first, second] = await Promise.all([
    channel.post(conv.key, { type: 'message', text: 'hello' }),
    channel.post(conv.key, { type: 'message', text: 'Ann' }),
  ]);
  assert.deepEqual(texts(first), ['Name?']);
  assert.deepEqual(texts(second), ['Hi Ann']);
  assert.equal(channel.isBusy(conv.key), false);

  await channel.send(conv.key, { type: 'endOfConversation' });
  channel.close(conv.key);
  assert.deepEqual(await printed, ['Name?', 'Hi Ann', '[endOfConversation]']);
}

async function conversationsAreSeparate(): Promise<void> {
  const a = new TestConversation(greeting, 'root', undefined, { key: 'a' });
  const channel = new InProcessChannel(a.manager);
  const subA = channel.subscribe('a');
  const subB = channel.subscribe('b');
  const printedA = collect(subA);
  const printedB = collect(subB);

  await channel.post('a', { type: 'message', text: 'hello' });
  await channel.post('b', { type: 'message', text: 'hello' });
  await channel.post('b', { type: 'message', text: 'Bo' });
  channel.close('a');
  channel.close('b');

  assert.deepEqual(await printedA, ['Name?']);
  assert.deepEqual(await printedB, ['Name?', 'Hi Bo']);
  channel.close('never-used');
}

function message(text: string): Activity {
  return { type: 'message', text };
}

async function streamEndings(): Promise<void> {
  const stream = new ActivityStream('k');
  const early = stream.subscribe();
  stream.publish(message('one'));
  const late = stream.subscribe();
  stream.publish(message('two'));

  assert.equal((await early.read())?.text, 'one');
  assert.equal((await late.read())?.text, 'two');
  late.unsubscribe();
  assert.equal(await late.read(), undefined);
  assert.equal(late.isEnded, true);

  // Closing lets subscribers drain their backlog first.
  stream.close();
  assert.equal(stream.isClosed, true);
  assert.equal(stream.publish(message('three')), false);
  assert.equal((await early.read())?.text, 'two');
  assert.equal(await early.read(), undefined);

  // Unsubscribing drops the backlog and wakes a waiting reader.
  const other = new ActivityStream('k2');
  const dropped = other.subscribe();
  other.publish(message('unread'));
  dropped.unsubscribe();
  assert.equal(await dropped.read(), undefined);
  const waiting = other.subscribe();
  const pending = waiting.read();
  waiting.unsubscribe();
  assert.equal(await pending, undefined);
}

async function main(): Promise<void> {
  await turnsRunInOrder();
  await conversationsAreSeparate();
  await streamEndings();
  console.log('channel tests: ok');
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
