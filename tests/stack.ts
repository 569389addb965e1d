/**
 * Dialog stack control: begin/end with results, replace, repeat, cancel,
 * parent interruptions of a waiting input (including handlers that span
 * turns), and event routing.
 */

import assert from 'node:assert/strict';
import type { Step } from '../main/shared/types/steps';
import { TestConversation, regexRecognizer, texts } from './helpers/conversation';

async function childResultLandsInParent(): Promise<void> {
  const conv = new TestConversation(
    [
      {
        id: 'root',
        steps: [
          { kind: 'beginDialog', dialog: 'double', options: { n: '2 + 3' }, resultProperty: 'dialog.result' },
          { kind: 'sendActivity', activity: 'Result {dialog.result}' },
          { kind: 'sendActivity', activity: 'Parent sees [{dialog.secret}]' },
        ],
      },
      {
        id: 'double',
        steps: [
          { kind: 'setProperty', property: 'dialog.secret', value: "'hidden'" },
          { kind: 'endDialog', value: 'dialog.n * 2' },
        ],
      },
    ],
    'root',
  );

  const result = await conv.start();
  assert.deepEqual(texts(result), ['Result 10', 'Parent sees []']);
  assert.equal(result.outcome, 'stackCompleted');
  assert.equal(result.stackDepth, 0);
}

async function childInputSuspendsWholeStack(): Promise<void> {
  const conv = new TestConversation(
    [
      {
        id: 'root',
        steps: [
          { kind: 'beginDialog', dialog: 'ask' },
          { kind: 'sendActivity', activity: 'Thanks {user.color}' },
        ],
      },
      {
        id: 'ask',
        steps: [{ kind: 'textInput', property: 'user.color', prompt: 'Favorite color?' }],
      },
    ],
    'root',
  );

  const first = await conv.start();
  assert.deepEqual(texts(first), ['Favorite color?']);
  assert.equal(first.stackDepth, 2);

  const snapshot = await conv.manager.getSnapshot(conv.key);
  assert.ok(snapshot);
  assert.deepEqual(
    snapshot.stack.map((instance) => instance.dialogId),
    ['root', 'ask'],
  );
  assert.equal(snapshot.stack[0].cursor[0].parked, true);

  const second = await conv.say('blue');
  assert.deepEqual(texts(second), ['Thanks blue']);
  assert.equal(second.outcome, 'stackCompleted');
  assert.equal(second.stackDepth, 0);
}

async function replaceDialogHandsBackToCaller(): Promise<void> {
  const conv = new TestConversation(
    [
      {
        id: 'root',
        steps: [
          { kind: 'beginDialog', dialog: 'first' },
          { kind: 'sendActivity', activity: 'Root resumed' },
        ],
      },
      {
        id: 'first',
        steps: [
          { kind: 'sendActivity', activity: 'In first' },
          { kind: 'replaceDialog', dialog: 'second', options: { from: "'first'" } },
          { kind: 'sendActivity', activity: 'Never sent' },
        ],
      },
      {
        id: 'second',
        steps: [{ kind: 'sendActivity', activity: 'In second from {dialog.from}' }],
      },
    ],
    'root',
  );

  const result = await conv.start();
  assert.deepEqual(texts(result), ['In first', 'In second from first', 'Root resumed']);
  assert.equal(result.outcome, 'stackCompleted');
}

async function repeatDialogKeepsDialogScope(): Promise<void> {
  const conv = new TestConversation(
    [
      {
        id: 'root',
        steps: [
          {
            kind: 'ifCondition',
            condition: '!exists(dialog.count)',
            steps: [{ kind: 'setProperty', property: 'dialog.count', value: '0' }],
          },
          { kind: 'setProperty', property: 'dialog.count', value: 'dialog.count + 1' },
          { kind: 'sendActivity', activity: 'Pass {dialog.count}' },
          { kind: 'ifCondition', condition: 'dialog.count < 3', steps: [{ kind: 'repeatDialog' }] },
        ],
      },
    ],
    'root',
  );

  const result = await conv.start();
  assert.deepEqual(texts(result), ['Pass 1', 'Pass 2', 'Pass 3']);
  assert.equal(result.outcome, 'stackCompleted');
}

async function cancelAllDialogsEmptiesStack(): Promise<void> {
  const conv = new TestConversation(
    [
      {
        id: 'root',
        steps: [
          { kind: 'beginDialog', dialog: 'child' },
          { kind: 'sendActivity', activity: 'Never from root' },
        ],
      },
      {
        id: 'child',
        steps: [
          { kind: 'sendActivity', activity: 'Cancelling' },
          { kind: 'cancelAllDialogs' },
          { kind: 'sendActivity', activity: 'Never from child' },
        ],
      },
    ],
    'root',
  );

  const result = await conv.start();
  assert.deepEqual(texts(result), ['Cancelling']);
  assert.equal(result.outcome, 'stackCompleted');
  assert.equal(result.stackDepth, 0);
  const snapshot = await conv.manager.getSnapshot(conv.key);
  assert.deepEqual(snapshot?.stack, []);
}

async function parentRuleInterruptsWaitingInput(): Promise<void> {
  const conv = new TestConversation(
    [
      {
        id: 'root',
        recognizer: regexRecognizer({ Help: '(?i)help' }),
        rules: [{ trigger: { kind: 'intent', intent: 'Help' }, steps: [{ kind: 'sendActivity', activity: 'Help text' }] }],
        steps: [
          { kind: 'beginDialog', dialog: 'ask' },
          { kind: 'sendActivity', activity: 'Done {user.color}' },
        ],
      },
      {
        id: 'ask',
        steps: [{ kind: 'textInput', property: 'user.color', prompt: 'Favorite color?' }],
      },
    ],
    'root',
  );

  assert.deepEqual(texts(await conv.start()), ['Favorite color?']);

  const interrupted = await conv.say('help');
  assert.deepEqual(texts(interrupted), ['Help text', 'Favorite color?']);
  assert.equal(interrupted.stackDepth, 2);

  const answered = await conv.say('green');
  assert.deepEqual(texts(answered), ['Done green']);
  assert.equal(answered.outcome, 'stackCompleted');
}

async function depthHoldsAfterReplaceAndRepeat(): Promise<void> {
  const replaced = new TestConversation(
    [
      {
        id: 'root',
        steps: [
          { kind: 'beginDialog', dialog: 'first' },
          { kind: 'sendActivity', activity: 'Root got {user.x}' },
        ],
      },
      { id: 'first', steps: [{ kind: 'replaceDialog', dialog: 'second' }] },
      { id: 'second', steps: [{ kind: 'textInput', property: 'user.x', prompt: 'X?' }] },
    ],
    'root',
  );
  const waiting = await replaced.start();
  assert.deepEqual(texts(waiting), ['X?']);
  assert.equal(waiting.stackDepth, 2);
  const snapshot = await replaced.manager.getSnapshot(replaced.key);
  assert.deepEqual(
    snapshot?.stack.map((instance) => instance.dialogId),
    ['root', 'second'],
  );
  const done = await replaced.say('ok');
  assert.deepEqual(texts(done), ['Root got ok']);
  assert.equal(done.outcome, 'stackCompleted');

  const repeated = new TestConversation(
    [
      {
        id: 'root',
        steps: [
          { kind: 'beginDialog', dialog: 'again' },
          { kind: 'sendActivity', activity: 'Root done' },
        ],
      },
      {
        id: 'again',
        steps: [
          { kind: 'textInput', property: 'dialog.answer', prompt: 'Again?', alwaysPrompt: true },
          { kind: 'ifCondition', condition: "dialog.answer != 'stop'", steps: [{ kind: 'repeatDialog' }] },
        ],
      },
    ],
    'root',
  );
  const before = await repeated.start();
  assert.equal(before.stackDepth, 2);
  for (const answer of ['more', 'more']) {
    const next = await repeated.say(answer);
    assert.deepEqual(texts(next), ['Again?']);
    assert.equal(next.stackDepth, before.stackDepth);
  }
  assert.deepEqual(await repeated.sayTexts('stop'), ['Root done']);
}

function helpWhileAsking(handler: Step[]): TestConversation {
  return new TestConversation(
    [
      {
        id: 'root',
        recognizer: regexRecognizer({ Help: '(?i)help', Quit: '(?i)quit' }),
        rules: [
          {
            trigger: { kind: 'intent', intent: 'Help' },
            steps: handler,
          },
          {
            trigger: { kind: 'intent', intent: 'Quit' },
            steps: [
              {
                kind: 'confirmInput',
                property: 'dialog.sure',
                prompt: 'Really quit?',
                style: 'none',
                alwaysPrompt: true,
              },
              {
                kind: 'ifCondition',
                condition: 'dialog.sure',
                steps: [{ kind: 'cancelAllDialogs' }],
                elseSteps: [{ kind: 'sendActivity', activity: 'Staying' }],
              },
            ],
          },
        ],
        steps: [
          { kind: 'beginDialog', dialog: 'ask' },
          { kind: 'sendActivity', activity: 'Thanks {user.color}' },
        ],
      },
      {
        id: 'ask',
        steps: [{ kind: 'textInput', property: 'user.color', prompt: 'Favorite color?' }],
      },
    ],
    'root',
  );
}

async function parentHandlerSuspendsWithoutCancellingChild(): Promise<void> {
  const conv = helpWhileAsking([
    { kind: 'sendActivity', activity: 'Help page 1' },
    { kind: 'endTurn' },
    { kind: 'sendActivity', activity: 'Help page 2' },
  ]);
  assert.deepEqual(texts(await conv.start()), ['Favorite color?']);

  const paged = await conv.say('help');
  assert.deepEqual(texts(paged), ['Help page 1']);
  assert.equal(paged.outcome, 'suspended');
  assert.equal(paged.stackDepth, 2);
  assert.equal((await conv.manager.getSnapshot(conv.key))?.activeIndex, 0);

  const resumed = await conv.say('whatever');
  assert.deepEqual(texts(resumed), ['Help page 2', 'Favorite color?']);
  assert.equal(resumed.stackDepth, 2);
  assert.equal((await conv.manager.getSnapshot(conv.key))?.activeIndex, undefined);

  const answered = await conv.say('red');
  assert.deepEqual(texts(answered), ['Thanks red']);
  assert.equal(answered.outcome, 'stackCompleted');
}

async function parentInputKeepsChildWaiting(): Promise<void> {
  const conv = helpWhileAsking([{ kind: 'sendActivity', activity: 'Help text' }]);
  await conv.start();

  const confirming = await conv.say('quit');
  assert.deepEqual(texts(confirming), ['Really quit?']);
  assert.equal(confirming.stackDepth, 2);

  const declined = await conv.say('no');
  assert.deepEqual(texts(declined), ['Staying', 'Favorite color?']);
  assert.equal(declined.stackDepth, 2);
  assert.deepEqual(await conv.sayTexts('blue'), ['Thanks blue']);

  const quitter = helpWhileAsking([{ kind: 'sendActivity', activity: 'Help text' }]);
  await quitter.start();
  await quitter.say('quit');
  const quit = await quitter.say('yes');
  assert.deepEqual(texts(quit), []);
  assert.equal(quit.outcome, 'stackCompleted');
  assert.equal(quit.stackDepth, 0);
}

async function catchAllIgnoredWhileStepsQueued(): Promise<void> {
  const conv = new TestConversation(
    [
      {
        id: 'root',
        autoEndDialog: false,
        recognizer: regexRecognizer({ Ask: '(?i)^ask' }),
        rules: [
          {
            trigger: { kind: 'intent', intent: 'Ask' },
            steps: [
              { kind: 'textInput', property: 'dialog.answer', prompt: 'X?' },
              { kind: 'sendActivity', activity: 'Got {dialog.answer}' },
            ],
          },
          { trigger: { kind: 'unknownIntent' }, steps: [{ kind: 'sendActivity', activity: 'Fallback' }] },
        ],
      },
    ],
    'root',
  );

  const first = await conv.say('hello');
  assert.deepEqual(texts(first), ['Fallback']);
  assert.equal(first.outcome, 'suspended');
  assert.equal(first.stackDepth, 1);

  assert.deepEqual(await conv.sayTexts('ask'), ['X?']);
  assert.deepEqual(await conv.sayTexts('whatever'), ['Got whatever']);
}

async function unhandledEventsAreReported(): Promise<void> {
  const conv = new TestConversation(
    [
      {
        id: 'root',
        steps: [
          { kind: 'emitEvent', eventName: 'Ping' },
          { kind: 'beginDialog', dialog: 'child' },
          { kind: 'sendActivity', activity: 'after' },
        ],
      },
      {
        id: 'child',
        steps: [{ kind: 'emitEvent', eventName: 'Lost', bubbleEvent: true }],
      },
    ],
    'root',
  );

  const result = await conv.start();
  assert.deepEqual(texts(result), ['after']);
  assert.deepEqual(result.unhandledEvents, ['Ping', 'Lost']);
}

async function localEventHandlerRunsBeforeRemainingSteps(): Promise<void> {
  const conv = new TestConversation(
    [
      {
        id: 'root',
        rules: [
          {
            trigger: { kind: 'event', events: ['Saved'] },
            steps: [{ kind: 'sendActivity', activity: 'saved {turn.dialogEvent.value}' }],
          },
        ],
        steps: [
          { kind: 'emitEvent', eventName: 'Saved', eventValue: "'draft'" },
          { kind: 'sendActivity', activity: 'next' },
        ],
      },
    ],
    'root',
  );

  const result = await conv.start();
  assert.deepEqual(texts(result), ['saved draft', 'next']);
  assert.deepEqual(result.unhandledEvents, []);
}

async function main(): Promise<void> {
  await childResultLandsInParent();
  await childInputSuspendsWholeStack();
  await replaceDialogHandsBackToCaller();
  await repeatDialogKeepsDialogScope();
  await depthHoldsAfterReplaceAndRepeat();
  await cancelAllDialogsEmptiesStack();
  await parentRuleInterruptsWaitingInput();
  await parentHandlerSuspendsWithoutCancellingChild();
  await parentInputKeepsChildWaiting();
  await catchAllIgnoredWhileStepsQueued();
  await unhandledEventsAreReported();
  await localEventHandlerRunsBeforeRemainingSteps();
  console.log('stack tests: ok');
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
