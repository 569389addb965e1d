/**
 * Module: declarative
 *
 * Dialogs written as YAML:
 *
 * ```yaml
 * root: main
 * dialogs:
 *   main:
 *     recognizer:
 *       intents:
 *         - { intent: Greeting, pattern: '(?i)hello' }
 *     steps:
 *       - { kind: textInput, property: user.name, prompt: 'Hello, what is your name?' }
 *       - { kind: sendActivity, activity: 'Hello {user.name}, nice to meet you!' }
 * ```
 *
 * Every field is checked against the step or trigger it belongs to; problems
 * are reported as `ConfigurationError` with the path of the offending value.
 */
import * as fs from 'fs';
import * as yaml from 'yaml';
import { DialogSet, type DialogDefinition, type RecognizerConfig } from './dialog';
import { ConfigurationError } from './errors';
import type { RegexIntent } from './recognizers';
import type { ActivityType } from './shared/types/activity';
import type { IntentTrigger, Rule, Trigger } from './shared/types/rules';
import type { ChoiceOption, ListStyle, Step, StepKind, SwitchCase } from './shared/types/steps';

export type DeclarativeDialogs = Readonly<{
  rootDialogId: string;
  definitions: DialogDefinition[];
}>;

const ROOT_KEYS = ['root', 'dialogs'] as const;
const DIALOG_KEYS = ['autoEndDialog', 'recognizer', 'steps', 'rules'] as const;
const RULE_KEYS = ['trigger', 'condition', 'priority', 'steps'] as const;
const INPUT_KEYS = [
  'property',
  'prompt',
  'unrecognizedPrompt',
  'invalidPrompt',
  'validations',
  'value',
  'alwaysPrompt',
  'maxTurnCount',
  'defaultValue',
] as const;

const STEP_KEYS: Record<StepKind, readonly string[]> = {
  sendActivity: ['activity'],
  setProperty: ['property', 'value'],
  initProperty: ['property', 'type'],
  deleteProperty: ['property'],
  editArray: ['changeType', 'itemsProperty', 'value', 'resultProperty'],
  ifCondition: ['condition', 'steps', 'elseSteps'],
  switchCondition: ['condition', 'cases', 'default'],
  foreach: ['itemsProperty', 'indexProperty', 'valueProperty', 'steps'],
  foreachPage: ['itemsProperty', 'pageSize', 'pageProperty', 'pageIndexProperty', 'steps'],
  beginDialog: ['dialog', 'options', 'resultProperty'],
  replaceDialog: ['dialog', 'options'],
  endDialog: ['value'],
  repeatDialog: [],
  cancelAllDialogs: [],
  endTurn: [],
  emitEvent: ['eventName', 'eventValue', 'bubbleEvent'],
  editSteps: ['changeType', 'steps'],
  traceActivity: ['name', 'valueType', 'value'],
  logStep: ['text', 'traceActivity'],
  textInput: [...INPUT_KEYS, 'outputFormat'],
  numberInput: [...INPUT_KEYS, 'outputFormat'],
  confirmInput: [...INPUT_KEYS, 'style'],
  choiceInput: [...INPUT_KEYS, 'choices', 'choicesProperty', 'style', 'outputFormat'],
};

const ACTIVITY_TYPES: readonly ActivityType[] = [
  'message',
  'conversationUpdate',
  'event',
  'trace',
  'endOfConversation',
];

function isStepKind(value: string): value is StepKind {
  return Object.prototype.hasOwnProperty.call(STEP_KEYS, value);
}

function describeValueType(value: unknown): string {
  if (value === undefined) return 'undefined';
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function invalid(at: string, reason: string): ConfigurationError {
  return new ConfigurationError(`Invalid ${at}: ${reason}`);
}

function asRecord(value: unknown, at: string): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw invalid(at, `expected an object (got ${describeValueType(value)})`);
  }
  return Object.fromEntries(Object.entries(value));
}

function asArray(value: unknown, at: string): unknown[] {
  if (!Array.isArray(value)) {
    throw invalid(at, `expected a list (got ${describeValueType(value)})`);
  }
  return value;
}

function asString(value: unknown, at: string): string {
  if (typeof value !== 'string') {
    throw invalid(at, `expected a string (got ${describeValueType(value)})`);
  }
  return value;
}

function asOptionalString(value: unknown, at: string): string | undefined {
  return value === undefined ? undefined : asString(value, at);
}

function asOptionalBoolean(value: unknown, at: string): boolean | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw invalid(at, `expected a boolean (got ${describeValueType(value)})`);
  }
  return value;
}

function asOptionalNumber(value: unknown, at: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw invalid(at, `expected a number (got ${describeValueType(value)})`);
  }
  return value;
}

/** Expressions may be written as bare YAML scalars: `value: 10`. */
function asExpression(value: unknown, at: string): string {
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return asString(value, at);
}

function asOptionalExpression(value: unknown, at: string): string | undefined {
  return value === undefined ? undefined : asExpression(value, at);
}

function asEnum<T extends string>(value: unknown, allowed: readonly T[], at: string): T {
  const found = allowed.find((candidate) => candidate === value);
  if (found === undefined) {
    throw invalid(at, `expected one of ${allowed.join(', ')} (got ${JSON.stringify(value)})`);
  }
  return found;
}

function asOptionalEnum<T extends string>(value: unknown, allowed: readonly T[], at: string): T | undefined {
  return value === undefined ? undefined : asEnum(value, allowed, at);
}

function rejectUnknownKeys(obj: Record<string, unknown>, allowedKeys: readonly string[], at: string): void {
  const allowed = new Set(allowedKeys);
  const unknown = Object.keys(obj)
    .filter((key) => !allowed.has(key))
    .sort((a, b) => a.localeCompare(b));
  if (unknown.length > 0) {
    throw invalid(at, `unknown field(s) ${unknown.map((key) => `'${key}'`).join(', ')}`);
  }
}

function parseStringList(value: unknown, at: string): string[] {
  return asArray(value, at).map((item, i) => asString(item, `${at}[${i}]`));
}

function parseOptions(value: unknown, at: string): Record<string, string> | undefined {
  if (value === undefined) return undefined;
  const record = asRecord(value, at);
  const options: Record<string, string> = {};
  for (const [key, expression] of Object.entries(record)) {
    options[key] = asExpression(expression, `${at}.${key}`);
  }
  return options;
}

function parseChoices(value: unknown, at: string): ChoiceOption[] | undefined {
  if (value === undefined) return undefined;
  return asArray(value, at).map((item, i): ChoiceOption => {
    const itemAt = `${at}[${i}]`;
    if (typeof item === 'string') return item;
    const record = asRecord(item, itemAt);
    rejectUnknownKeys(record, ['value', 'synonyms'], itemAt);
    const choice: { value: string; synonyms?: string[] } = { value: asString(record.value, `${itemAt}.value`) };
    if (record.synonyms !== undefined) choice.synonyms = parseStringList(record.synonyms, `${itemAt}.synonyms`);
    return choice;
  });
}

export function parseSteps(value: unknown, at: string): Step[] {
  return asArray(value, at).map((item, i) => parseStep(item, `${at}[${i}]`));
}

function parseOptionalSteps(value: unknown, at: string): Step[] | undefined {
  return value === undefined ? undefined : parseSteps(value, at);
}

const LIST_STYLES: readonly ListStyle[] = ['inline', 'list', 'none'];

export function parseStep(value: unknown, at: string): Step {
  const raw = asRecord(value, at);
  const kind = asString(raw.kind, `${at}.kind`);
  if (!isStepKind(kind)) {
    throw invalid(`${at}.kind`, `unknown step kind '${kind}'`);
  }
  rejectUnknownKeys(raw, ['kind', ...STEP_KEYS[kind]], at);
  const field = (name: string) => `${at}.${name}`;

  const inputBase = () => ({
    property: asString(raw.property, field('property')),
    prompt: asOptionalString(raw.prompt, field('prompt')),
    unrecognizedPrompt: asOptionalString(raw.unrecognizedPrompt, field('unrecognizedPrompt')),
    invalidPrompt: asOptionalString(raw.invalidPrompt, field('invalidPrompt')),
    validations:
      raw.validations === undefined ? undefined : parseStringList(raw.validations, field('validations')),
    value: asOptionalExpression(raw.value, field('value')),
    alwaysPrompt: asOptionalBoolean(raw.alwaysPrompt, field('alwaysPrompt')),
    maxTurnCount: asOptionalNumber(raw.maxTurnCount, field('maxTurnCount')),
    defaultValue: asOptionalExpression(raw.defaultValue, field('defaultValue')),
  });

  let step: Step;
  switch (kind) {
    case 'sendActivity':
      step = { kind, activity: asString(raw.activity, field('activity')) };
      break;
    case 'setProperty':
      step = {
        kind,
        property: asString(raw.property, field('property')),
        value: asExpression(raw.value, field('value')),
      };
      break;
    case 'initProperty':
      step = {
        kind,
        property: asString(raw.property, field('property')),
        type: asEnum(raw.type, ['object', 'array'], field('type')),
      };
      break;
    case 'deleteProperty':
      step = { kind, property: asString(raw.property, field('property')) };
      break;
    case 'editArray':
      step = {
        kind,
        changeType: asEnum(raw.changeType, ['push', 'pop', 'take', 'remove', 'clear'], field('changeType')),
        itemsProperty: asString(raw.itemsProperty, field('itemsProperty')),
        value: asOptionalExpression(raw.value, field('value')),
        resultProperty: asOptionalString(raw.resultProperty, field('resultProperty')),
      };
      break;
    case 'ifCondition':
      step = {
        kind,
        condition: asExpression(raw.condition, field('condition')),
        steps: parseSteps(raw.steps, field('steps')),
        elseSteps: parseOptionalSteps(raw.elseSteps, field('elseSteps')),
      };
      break;
    case 'switchCondition':
      step = {
        kind,
        condition: asExpression(raw.condition, field('condition')),
        cases: asArray(raw.cases, field('cases')).map((item, i): SwitchCase => {
          const caseAt = `${field('cases')}[${i}]`;
          const record = asRecord(item, caseAt);
          rejectUnknownKeys(record, ['value', 'steps'], caseAt);
          return {
            value: asExpression(record.value, `${caseAt}.value`),
            steps: parseSteps(record.steps, `${caseAt}.steps`),
          };
        }),
        default: parseOptionalSteps(raw.default, field('default')),
      };
      break;
    case 'foreach':
      step = {
        kind,
        itemsProperty: asString(raw.itemsProperty, field('itemsProperty')),
        indexProperty: asOptionalString(raw.indexProperty, field('indexProperty')),
        valueProperty: asOptionalString(raw.valueProperty, field('valueProperty')),
        steps: parseSteps(raw.steps, field('steps')),
      };
      break;
    case 'foreachPage':
      step = {
        kind,
        itemsProperty: asString(raw.itemsProperty, field('itemsProperty')),
        pageSize: asOptionalNumber(raw.pageSize, field('pageSize')),
        pageProperty: asOptionalString(raw.pageProperty, field('pageProperty')),
        pageIndexProperty: asOptionalString(raw.pageIndexProperty, field('pageIndexProperty')),
        steps: parseSteps(raw.steps, field('steps')),
      };
      break;
    case 'beginDialog':
      step = {
        kind,
        dialog: asString(raw.dialog, field('dialog')),
        options: parseOptions(raw.options, field('options')),
        resultProperty: asOptionalString(raw.resultProperty, field('resultProperty')),
      };
      break;
    case 'replaceDialog':
      step = {
        kind,
        dialog: asString(raw.dialog, field('dialog')),
        options: parseOptions(raw.options, field('options')),
      };
      break;
    case 'endDialog':
      step = { kind, value: asOptionalExpression(raw.value, field('value')) };
      break;
    case 'repeatDialog':
    case 'cancelAllDialogs':
    case 'endTurn':
      step = { kind };
      break;
    case 'emitEvent':
      step = {
        kind,
        eventName: asString(raw.eventName, field('eventName')),
        eventValue: asOptionalExpression(raw.eventValue, field('eventValue')),
        bubbleEvent: asOptionalBoolean(raw.bubbleEvent, field('bubbleEvent')),
      };
      break;
    case 'editSteps':
      step = {
        kind,
        changeType: asEnum(
          raw.changeType,
          ['replaceSequence', 'insertSteps', 'appendSteps', 'endSequence'],
          field('changeType'),
        ),
        steps: parseOptionalSteps(raw.steps, field('steps')),
      };
      break;
    case 'traceActivity':
      step = {
        kind,
        name: asOptionalString(raw.name, field('name')),
        valueType: asOptionalString(raw.valueType, field('valueType')),
        value: asOptionalExpression(raw.value, field('value')),
      };
      break;
    case 'logStep':
      step = {
        kind,
        text: asString(raw.text, field('text')),
        traceActivity: asOptionalBoolean(raw.traceActivity, field('traceActivity')),
      };
      break;
    case 'textInput':
      step = {
        kind,
        ...inputBase(),
        outputFormat: asOptionalEnum(
          raw.outputFormat,
          ['none', 'trim', 'lowercase', 'uppercase'],
          field('outputFormat'),
        ),
      };
      break;
    case 'numberInput':
      step = {
        kind,
        ...inputBase(),
        outputFormat: asOptionalEnum(raw.outputFormat, ['float', 'integer'], field('outputFormat')),
      };
      break;
    case 'confirmInput':
      step = { kind, ...inputBase(), style: asOptionalEnum(raw.style, LIST_STYLES, field('style')) };
      break;
    case 'choiceInput':
      step = {
        kind,
        ...inputBase(),
        choices: parseChoices(raw.choices, field('choices')),
        choicesProperty: asOptionalString(raw.choicesProperty, field('choicesProperty')),
        style: asOptionalEnum(raw.style, LIST_STYLES, field('style')),
        outputFormat: asOptionalEnum(raw.outputFormat, ['value', 'index'], field('outputFormat')),
      };
      break;
    default: {
      const unexpected: never = kind;
      throw invalid(`${at}.kind`, `unknown step kind '${String(unexpected)}'`);
    }
  }
  return dropUndefined(step);
}

/** Optional fields left unset stay absent instead of holding `undefined`. */
function dropUndefined<T extends object>(value: T): T {
  for (const key of Object.keys(value)) {
    if (Reflect.get(value, key) === undefined) Reflect.deleteProperty(value, key);
  }
  return value;
}

export function parseTrigger(value: unknown, at: string): Trigger {
  const raw = asRecord(value, at);
  const kind = asEnum(raw.kind, ['intent', 'unknownIntent', 'event', 'activity'], `${at}.kind`);
  switch (kind) {
    case 'intent': {
      rejectUnknownKeys(raw, ['kind', 'intent', 'entities'], at);
      const trigger: IntentTrigger = { kind, intent: asString(raw.intent, `${at}.intent`) };
      if (raw.entities !== undefined) trigger.entities = parseStringList(raw.entities, `${at}.entities`);
      return trigger;
    }
    case 'unknownIntent':
      rejectUnknownKeys(raw, ['kind'], at);
      return { kind };
    case 'event': {
      rejectUnknownKeys(raw, ['kind', 'events'], at);
      const events = typeof raw.events === 'string' ? [raw.events] : parseStringList(raw.events, `${at}.events`);
      if (events.length === 0) throw invalid(`${at}.events`, 'expected at least one event name');
      return { kind, events };
    }
    case 'activity':
      rejectUnknownKeys(raw, ['kind', 'activityType'], at);
      return { kind, activityType: asEnum(raw.activityType, ACTIVITY_TYPES, `${at}.activityType`) };
  }
}

function parseRule(value: unknown, at: string): Rule {
  const raw = asRecord(value, at);
  rejectUnknownKeys(raw, RULE_KEYS, at);
  const rule: Rule = {
    trigger: parseTrigger(raw.trigger, `${at}.trigger`),
    steps: parseSteps(raw.steps ?? [], `${at}.steps`),
  };
  const condition = asOptionalExpression(raw.condition, `${at}.condition`);
  if (condition !== undefined) rule.condition = condition;
  const priority = asOptionalNumber(raw.priority, `${at}.priority`);
  if (priority !== undefined) rule.priority = priority;
  return rule;
}

function parseRecognizer(value: unknown, at: string): RecognizerConfig {
  const raw = asRecord(value, at);
  rejectUnknownKeys(raw, ['kind', 'intents'], at);
  if (raw.kind !== undefined) asEnum(raw.kind, ['regex'], `${at}.kind`);
  const intents = asArray(raw.intents, `${at}.intents`).map((item, i): RegexIntent => {
    const intentAt = `${at}.intents[${i}]`;
    const record = asRecord(item, intentAt);
    rejectUnknownKeys(record, ['intent', 'pattern'], intentAt);
    return {
      intent: asString(record.intent, `${intentAt}.intent`),
      pattern: asString(record.pattern, `${intentAt}.pattern`),
    };
  });
  return { kind: 'regex', intents };
}

function parseDialog(id: string, value: unknown, at: string): DialogDefinition {
  const raw = asRecord(value ?? {}, at);
  rejectUnknownKeys(raw, DIALOG_KEYS, at);
  const definition: DialogDefinition = { id };
  const autoEnd = asOptionalBoolean(raw.autoEndDialog, `${at}.autoEndDialog`);
  if (autoEnd !== undefined) definition.autoEndDialog = autoEnd;
  if (raw.recognizer !== undefined) definition.recognizer = parseRecognizer(raw.recognizer, `${at}.recognizer`);
  if (raw.steps !== undefined) definition.steps = parseSteps(raw.steps, `${at}.steps`);
  if (raw.rules !== undefined) {
    definition.rules = asArray(raw.rules, `${at}.rules`).map((rule, i) => parseRule(rule, `${at}.rules[${i}]`));
  }
  return definition;
}

export function parseDialogsDocument(value: unknown): DeclarativeDialogs {
  const raw = asRecord(value, 'document');
  rejectUnknownKeys(raw, ROOT_KEYS, 'document');
  const dialogs = asRecord(raw.dialogs, 'dialogs');
  const definitions = Object.entries(dialogs).map(([id, body]) => parseDialog(id, body, `dialogs.${id}`));
  if (definitions.length === 0) throw invalid('dialogs', 'expected at least one dialog');
  const rootDialogId = raw.root === undefined ? definitions[0].id : asString(raw.root, 'root');
  if (!definitions.some((definition) => definition.id === rootDialogId)) {
    throw invalid('root', `no dialog named '${rootDialogId}'`);
  }
  return { rootDialogId, definitions };
}

export function parseDialogsYaml(source: string, origin = 'dialogs document'): DeclarativeDialogs {
  let parsed: unknown;
  try {
    parsed = yaml.parse(source);
  } catch (error) {
    throw new ConfigurationError(`Failed to parse ${origin} as YAML`, { cause: error });
  }
  return parseDialogsDocument(parsed);
}

export async function loadDialogsFile(filePath: string): Promise<DeclarativeDialogs & { dialogSet: DialogSet }> {
  let source: string;
  try {
    source = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read dialogs file ${filePath}`, { cause: error });
  }
  const loaded = parseDialogsYaml(source, filePath);
  return { ...loaded, dialogSet: new DialogSet(loaded.definitions) };
}
