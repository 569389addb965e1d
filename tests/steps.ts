/**
 * Step semantics that do not involve other dialogs: loops, array edits,
 * queue edits, branches, traces and explicit turn ends.
 */

import assert from 'node:assert/strict';
import { DialogSet } from '../main/dialog';
import { ConfigurationError, EvaluationError } from '../main/errors';
import { pageSlices, switchCaseMatches } from '../main/executor';
import { DialogManager } from '../main/manager';
import { isRecord } from '../main/memory';
import { MemoryStorage } from '../main/persistence';
import type { Step } from '../main/shared/types/steps';
import { TestConversation, quietLogger, texts } from './helpers/conversation';

function runSteps(steps: Step[], options?: { autoEndDialog?: boolean }): TestConversation {
  return new TestConversation([{ id: 'root', steps, autoEndDialog: options?.autoEndDialog }], 'root');
}

async function foreachBindsValueAndIndex(): Promise<void> {
  const conv = runSteps([
    { kind: 'setProperty', property: 'dialog.items', value: "['a', 'b', 'c']" },
    {
      kind: 'foreach',
      itemsProperty: 'dialog.items',
      steps: [{ kind: 'sendActivity', activity: '{dialog.index}:{dialog.value}' }],
    },
    { kind: 'sendActivity', activity: 'done' },
  ]);
  assert.deepEqual(texts(await conv.start()), ['0:a', '1:b', '2:c', 'done']);
}

async function loopBindingsLiveInDurableScopes(): Promise<void> {
  const loopOver = (valueProperty: string): Step[] => [
    { kind: 'setProperty', property: 'dialog.items', value: "['a', 'b']" },
    {
      kind: 'foreach',
      itemsProperty: 'dialog.items',
      valueProperty,
      steps: [{ kind: 'sendActivity', activity: 'v={dialog.v}' }],
    },
  ];
  assert.deepEqual(texts(await runSteps(loopOver('dialog.v')).start()), ['v=a', 'v=b']);

  assert.throws(
    () => runSteps(loopOver('this.value')),
    (error: unknown) =>
      error instanceof ConfigurationError &&
      error.message === "Invalid dialog root.steps[1] (foreach): Loop binding 'this.value' cannot use the 'this' scope",
  );
  assert.throws(
    () =>
      runSteps([
        {
          kind: 'foreachPage',
          itemsProperty: 'dialog.items',
          pageIndexProperty: 'this.page',
          steps: [],
        },
      ]),
    ConfigurationError,
  );

  // Definitions that skipped validation fail when the loop starts.
  const unchecked = new DialogManager({
    dialogs: new DialogSet([{ id: 'root', steps: loopOver('this.value') }]),
    rootDialogId: 'root',
    storage: new MemoryStorage(),
    logger: quietLogger,
    validate: false,
  });
  await assert.rejects(unchecked.processTurn('k', { type: 'conversationUpdate' }), ConfigurationError);
}

async function foreachPageWalksSlices(): Promise<void> {
  const conv = runSteps([
    { kind: 'setProperty', property: 'dialog.items', value: '[1, 2, 3, 4, 5]' },
    {
      kind: 'foreachPage',
      itemsProperty: 'dialog.items',
      pageSize: 2,
      pageProperty: 'dialog.page',
      pageIndexProperty: 'dialog.p',
      steps: [{ kind: 'sendActivity', activity: "page {dialog.p}: {join(dialog.page, '-')}" }],
    },
  ]);
  assert.deepEqual(texts(await conv.start()), ['page 0: 1-2', 'page 1: 3-4', 'page 2: 5']);
}

async function loopSuspendsAndResumesMidPass(): Promise<void> {
  const conv = runSteps([
    { kind: 'setProperty', property: 'dialog.items', value: "['tea', 'cake']" },
    {
      kind: 'foreach',
      itemsProperty: 'dialog.items',
      steps: [
        {
          kind: 'confirmInput',
          property: 'dialog.want',
          prompt: 'Want {dialog.value}?',
          style: 'none',
          alwaysPrompt: true,
        },
        {
          kind: 'ifCondition',
          condition: 'dialog.want',
          steps: [{ kind: 'editArray', changeType: 'push', itemsProperty: 'dialog.order', value: 'dialog.value' }],
        },
      ],
    },
    { kind: 'sendActivity', activity: "Order: {join(dialog.order, ', ')}" },
  ]);

  assert.deepEqual(texts(await conv.start()), ['Want tea?']);
  assert.deepEqual(await conv.sayTexts('yes'), ['Want cake?']);
  assert.deepEqual(await conv.sayTexts('yes please'), ['Order: tea, cake']);
}

async function editArrayChanges(): Promise<void> {
  const conv = runSteps([
    { kind: 'initProperty', property: 'dialog.list', type: 'array' },
    { kind: 'editArray', changeType: 'push', itemsProperty: 'dialog.list', value: '1' },
    { kind: 'editArray', changeType: 'push', itemsProperty: 'dialog.list', value: '2' },
    { kind: 'editArray', changeType: 'push', itemsProperty: 'dialog.list', value: '3' },
    { kind: 'editArray', changeType: 'pop', itemsProperty: 'dialog.list', resultProperty: 'dialog.popped' },
    { kind: 'editArray', changeType: 'take', itemsProperty: 'dialog.list', resultProperty: 'dialog.taken' },
    {
      kind: 'editArray',
      changeType: 'remove',
      itemsProperty: 'dialog.list',
      value: '5',
      resultProperty: 'dialog.removed',
    },
    { kind: 'sendActivity', activity: '{json(dialog.list)} {dialog.popped} {dialog.taken} {dialog.removed}' },
    { kind: 'editArray', changeType: 'clear', itemsProperty: 'dialog.list' },
    { kind: 'sendActivity', activity: 'left {length(dialog.list)}' },
  ]);
  assert.deepEqual(texts(await conv.start()), ['[2] 3 1 false', 'left 0']);
}

async function editArrayRejectsNonArray(): Promise<void> {
  const conv = runSteps([
    { kind: 'setProperty', property: 'dialog.list', value: "'text'" },
    { kind: 'editArray', changeType: 'push', itemsProperty: 'dialog.list', value: '1' },
  ]);
  await assert.rejects(conv.start(), (error: unknown) => {
    assert.ok(error instanceof Error);
    assert.equal(error.message, "Dialog 'root' faulted at step 'editArray': 'dialog.list' is not an array");
    return true;
  });
}

async function insertAndAppendSteps(): Promise<void> {
  const conv = runSteps([
    { kind: 'editSteps', changeType: 'appendSteps', steps: [{ kind: 'sendActivity', activity: 'appended' }] },
    { kind: 'editSteps', changeType: 'insertSteps', steps: [{ kind: 'sendActivity', activity: 'inserted' }] },
    { kind: 'sendActivity', activity: 'original' },
  ]);
  const result = await conv.start();
  assert.deepEqual(texts(result), ['inserted', 'original', 'appended']);
  assert.equal(result.outcome, 'stackCompleted');
}

async function endSequenceHonoursAutoEnd(): Promise<void> {
  const steps: Step[] = [
    { kind: 'sendActivity', activity: 'a' },
    { kind: 'editSteps', changeType: 'endSequence' },
    { kind: 'sendActivity', activity: 'b' },
  ];

  const ending = await runSteps(steps).start();
  assert.deepEqual(texts(ending), ['a']);
  assert.equal(ending.outcome, 'stackCompleted');

  const staying = await runSteps(steps, { autoEndDialog: false }).start();
  assert.deepEqual(texts(staying), ['a']);
  assert.equal(staying.outcome, 'suspended');
  assert.equal(staying.stackDepth, 1);
}

async function propertiesAndBranches(): Promise<void> {
  const conv = runSteps([
    { kind: 'setProperty', property: 'user.tmp', value: "'x'" },
    { kind: 'deleteProperty', property: 'user.tmp' },
    { kind: 'sendActivity', activity: '[{user.tmp}]' },
    {
      kind: 'ifCondition',
      condition: 'user.vip',
      steps: [{ kind: 'sendActivity', activity: 'vip' }],
      elseSteps: [{ kind: 'sendActivity', activity: 'regular' }],
    },
    {
      kind: 'switchCondition',
      condition: "toLower('GOLD')",
      cases: [
        { value: 'silver', steps: [{ kind: 'sendActivity', activity: 'Silver tier' }] },
        { value: 'gold', steps: [{ kind: 'sendActivity', activity: 'Gold tier' }] },
      ],
    },
    { kind: 'initProperty', property: 'conversation.profile', type: 'object' },
    { kind: 'setProperty', property: 'conversation.profile.tags[1]', value: "'b'" },
    { kind: 'sendActivity', activity: '{json(conversation.profile)}' },
  ]);
  assert.deepEqual(texts(await conv.start()), ['[]', 'regular', 'Gold tier', '{"tags":[null,"b"]}']);
}

async function tracesAndLogs(): Promise<void> {
  const conv = runSteps([
    { kind: 'setProperty', property: 'dialog.n', value: '3' },
    { kind: 'traceActivity', name: 'state', value: 'dialog.n' },
    { kind: 'traceActivity', valueType: 'memory' },
    { kind: 'logStep', text: 'Saw {dialog.n}', traceActivity: true },
  ]);
  const result = await conv.start();
  assert.equal(result.activities.length, 3);

  const [value, memory, logged] = result.activities;
  assert.equal(value.type, 'trace');
  assert.equal(value.name, 'state');
  assert.equal(value.valueType, 'number');
  assert.equal(value.value, 3);
  assert.equal(value.text, '3');

  assert.equal(memory.name, 'memory');
  assert.equal(memory.valueType, 'memory');
  assert.ok(isRecord(memory.value));
  assert.deepEqual(memory.value.dialog, { n: 3 });

  assert.equal(logged.name, 'logStep');
  assert.equal(logged.value, 'Saw 3');
}

async function endTurnWaitsForNextActivity(): Promise<void> {
  const conv = runSteps([
    { kind: 'sendActivity', activity: 'first' },
    { kind: 'endTurn' },
    { kind: 'sendActivity', activity: 'second' },
  ]);
  const first = await conv.start();
  assert.deepEqual(texts(first), ['first']);
  assert.equal(first.outcome, 'suspended');

  const second = await conv.say('go on');
  assert.deepEqual(texts(second), ['second']);
  assert.equal(second.outcome, 'stackCompleted');
}

function helpers(): void {
  assert.deepEqual(pageSlices([1, 2, 3, 4, 5], 2), [[1, 2], [3, 4], [5]]);
  assert.deepEqual(pageSlices([], 3), []);
  assert.throws(() => pageSlices([1], 0), EvaluationError);

  assert.equal(switchCaseMatches('22', 22), true);
  assert.equal(switchCaseMatches('', 0), false);
  assert.equal(switchCaseMatches('TRUE', true), true);
  assert.equal(switchCaseMatches('22', '22'), true);
  assert.equal(switchCaseMatches('22', null), false);
}

async function main(): Promise<void> {
  helpers();
  await foreachBindsValueAndIndex();
  await loopBindingsLiveInDurableScopes();
  await foreachPageWalksSlices();
  await loopSuspendsAndResumesMidPass();
  await editArrayChanges();
  await editArrayRejectsNonArray();
  await insertAndAppendSteps();
  await endSequenceHonoursAutoEnd();
  await propertiesAndBranches();
  await tracesAndLogs();
  await endTurnWaitsForNextActivity();
  console.log('step tests: ok');
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
