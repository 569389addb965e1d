/**
 * YAML dialog documents: parsing, validation paths and a conversation
 * driven from a file.
 */

import assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { loadDialogsFile, parseDialogsYaml, parseStep, parseTrigger } from '../main/declarative';
import { ConfigurationError } from '../main/errors';
import { TestConversation } from './helpers/conversation';

function failsWith(fn: () => unknown, message: string): void {
  assert.throws(fn, (error: unknown) => error instanceof ConfigurationError && error.message === message);
}

const GREETING = `
root: main
dialogs:
  main:
    steps:
      - { kind: textInput, property: user.name, prompt: 'Hello, what is your name?' }
      - { kind: sendActivity, activity: 'Hello {user.name}, nice to meet you!' }
`;

function parsing(): void {
  const parsed = parseDialogsYaml(`
dialogs:
  main:
    autoEndDialog: false
    recognizer:
      intents:
        - { intent: Help, pattern: '(?i)help' }
    rules:
      - trigger: { kind: intent, intent: Help }
        priority: 2
        condition: user.known
        steps:
          - { kind: beginDialog, dialog: help, options: { depth: 1 } }
  help:
    steps:
      - kind: setProperty
        property: dialog.count
        value: 10
`);
  assert.equal(parsed.rootDialogId, 'main');
  assert.deepEqual(parsed.definitions, [
    {
      id: 'main',
      autoEndDialog: false,
      recognizer: { kind: 'regex', intents: [{ intent: 'Help', pattern: '(?i)help' }] },
      rules: [
        {
          trigger: { kind: 'intent', intent: 'Help' },
          steps: [{ kind: 'beginDialog', dialog: 'help', options: { depth: '1' } }],
          condition: 'user.known',
          priority: 2,
        },
      ],
    },
    { id: 'help', steps: [{ kind: 'setProperty', property: 'dialog.count', value: '10' }] },
  ]);

  assert.deepEqual(parseStep({ kind: 'endDialog' }, 'x'), { kind: 'endDialog' });
  assert.deepEqual(
    parseStep({ kind: 'choiceInput', property: 'dialog.c', choices: ['a', { value: 'b', synonyms: ['bee'] }] }, 'x'),
    { kind: 'choiceInput', property: 'dialog.c', choices: ['a', { value: 'b', synonyms: ['bee'] }] },
  );
  assert.deepEqual(parseTrigger({ kind: 'event', events: 'saved' }, 't'), { kind: 'event', events: ['saved'] });
}

function validation(): void {
  failsWith(
    () => parseStep({ kind: 'teleport' }, 'dialogs.main.steps[0]'),
    "Invalid dialogs.main.steps[0].kind: unknown step kind 'teleport'",
  );
  failsWith(
    () => parseStep({ kind: 'sendActivity', activity: 'hi', colour: 'red' }, 's'),
    "Invalid s: unknown field(s) 'colour'",
  );
  failsWith(() => parseStep({ kind: 'sendActivity' }, 's'), 'Invalid s.activity: expected a string (got undefined)');
  failsWith(
    () => parseStep({ kind: 'editArray', changeType: 'shuffle', itemsProperty: 'dialog.xs' }, 's'),
    'Invalid s.changeType: expected one of push, pop, take, remove, clear (got "shuffle")',
  );
  failsWith(
    () => parseStep({ kind: 'numberInput', property: 'dialog.n', maxTurnCount: 'two' }, 's'),
    'Invalid s.maxTurnCount: expected a number (got string)',
  );
  failsWith(() => parseTrigger({ kind: 'event', events: [] }, 't'), 'Invalid t.events: expected at least one event name');
  failsWith(() => parseDialogsYaml('root: nope\ndialogs:\n  main: {}\n'), "Invalid root: no dialog named 'nope'");
  failsWith(() => parseDialogsYaml('dialogs: {}\n'), 'Invalid dialogs: expected at least one dialog');
  failsWith(() => parseDialogsYaml('- a\n- b\n'), 'Invalid document: expected an object (got array)');
  failsWith(() => parseDialogsYaml('dialogs: [unclosed\n', 'bad.yaml'), 'Failed to parse bad.yaml as YAML');
  failsWith(
    () => parseDialogsYaml('dialogs:\n  main:\n    steps:\n      - { kind: sendActivity, activity: 1 }\n'),
    'Invalid dialogs.main.steps[0].activity: expected a string (got number)',
  );
}

async function conversationFromFile(dir: string): Promise<void> {
  const file = path.join(dir, 'greeting.yaml');
  fs.writeFileSync(file, GREETING, 'utf8');

  const loaded = await loadDialogsFile(file);
  assert.equal(loaded.rootDialogId, 'main');
  assert.ok(loaded.dialogSet.has('main'));

  const conv = new TestConversation(loaded.definitions, loaded.rootDialogId);
  assert.deepEqual(await conv.sayTexts('hi'), ['Hello, what is your name?']);
  assert.deepEqual(await conv.sayTexts('Carlos'), ['Hello Carlos, nice to meet you!']);

  await assert.rejects(
    loadDialogsFile(path.join(dir, 'missing.yaml')),
    (error: unknown) =>
      error instanceof ConfigurationError && error.message === `Cannot read dialogs file ${path.join(dir, 'missing.yaml')}`,
  );
}

async function main(): Promise<void> {
  parsing();
  validation();
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'turnstack-declarative-'));
  try {
    await conversationFromFile(dir);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  console.log('declarative tests: ok');
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
