/**
 * Module: dialog
 *
 * Dialog definitions, their compiled form, and the registry that resolves
 * dialog ids.
 *
 * Compiling a dialog walks every nested step list (initial steps, rule
 * handlers, branches, loop bodies, edit payloads) in a fixed order and gives
 * each one an index into the dialog's list arena. Cursor frames store that
 * index, so persisted cursors stay valid for as long as the definition is
 * unchanged.
 */
import { ConfigurationError } from './errors';
import type { ExpressionEvaluator } from './expr/evaluate';
import type { LanguageGenerator } from './lg';
import { parseBindingPath, parsePropertyPath } from './memory';
import { RegexRecognizer, type Recognizer, type RegexIntent } from './recognizers';
import type { Rule, Trigger } from './shared/types/rules';
import type { Step } from './shared/types/steps';

export type RecognizerConfig = { kind: 'regex'; intents: RegexIntent[] };

export interface DialogDefinition {
  id: string;
  /** Run when the dialog begins. */
  steps?: Step[];
  rules?: Rule[];
  recognizer?: Recognizer | RecognizerConfig;
  /** End the dialog once its queued steps run out. Defaults to true. */
  autoEndDialog?: boolean;
}

function isRecognizerConfig(value: Recognizer | RecognizerConfig): value is RecognizerConfig {
  return 'kind' in value && value.kind === 'regex';
}

/** Nested step lists of one step, in arena order. */
export function childStepLists(step: Step): Step[][] {
  switch (step.kind) {
    case 'ifCondition':
      return step.elseSteps ? [step.steps, step.elseSteps] : [step.steps];
    case 'switchCondition': {
      const lists = step.cases.map((c) => c.steps);
      if (step.default) lists.push(step.default);
      return lists;
    }
    case 'foreach':
    case 'foreachPage':
      return [step.steps];
    case 'editSteps':
      return step.steps ? [step.steps] : [];
    default:
      return [];
  }
}

export class CompiledDialog {
  readonly id: string;
  readonly autoEndDialog: boolean;
  readonly rules: ReadonlyArray<Rule>;
  readonly recognizer: Recognizer | undefined;
  readonly initialListId: number | undefined;
  private readonly ruleListIds: number[];
  private readonly lists: Step[][] = [];
  private readonly listIds = new Map<Step[], number>();

  constructor(readonly definition: DialogDefinition) {
    this.id = definition.id;
    this.autoEndDialog = definition.autoEndDialog ?? true;
    this.rules = definition.rules ?? [];
    const recognizer = definition.recognizer;
    this.recognizer =
      recognizer === undefined
        ? undefined
        : isRecognizerConfig(recognizer)
          ? new RegexRecognizer(recognizer.intents)
          : recognizer;
    this.initialListId = definition.steps ? this.register(definition.steps) : undefined;
    this.ruleListIds = this.rules.map((rule) => this.register(rule.steps));
  }

  private register(list: Step[]): number {
    const existing = this.listIds.get(list);
    if (existing !== undefined) return existing;
    const id = this.lists.length;
    this.lists.push(list);
    this.listIds.set(list, id);
    for (const step of list) {
      for (const child of childStepLists(step)) this.register(child);
    }
    return id;
  }

  get listCount(): number {
    return this.lists.length;
  }

  list(listId: number): ReadonlyArray<Step> {
    const list = this.lists[listId];
    if (!list) {
      throw new ConfigurationError(`Dialog '${this.id}' has no step list #${listId}`);
    }
    return list;
  }

  listIdOf(list: Step[]): number {
    const id = this.listIds.get(list);
    if (id === undefined) {
      throw new ConfigurationError(`Step list does not belong to dialog '${this.id}'`);
    }
    return id;
  }

  ruleListId(ruleIndex: number): number {
    const id = this.ruleListIds[ruleIndex];
    if (id === undefined) {
      throw new ConfigurationError(`Dialog '${this.id}' has no rule #${ruleIndex}`);
    }
    return id;
  }
}

export type ValidationTools = {
  evaluator: ExpressionEvaluator;
  languageGenerator: LanguageGenerator;
};

export class DialogSet {
  private readonly dialogs = new Map<string, CompiledDialog>();

  constructor(definitions: ReadonlyArray<DialogDefinition> = []) {
    for (const definition of definitions) this.add(definition);
  }

  add(definition: DialogDefinition): this {
    if (!definition.id) {
      throw new ConfigurationError('Dialog id must be a non-empty string');
    }
    if (this.dialogs.has(definition.id)) {
      throw new ConfigurationError(`Duplicate dialog id '${definition.id}'`);
    }
    this.dialogs.set(definition.id, new CompiledDialog(definition));
    return this;
  }

  has(id: string): boolean {
    return this.dialogs.has(id);
  }

  get(id: string): CompiledDialog {
    const dialog = this.dialogs.get(id);
    if (!dialog) {
      throw new ConfigurationError(`Unknown dialog '${id}'`);
    }
    return dialog;
  }

  ids(): string[] {
    return [...this.dialogs.keys()];
  }

  /**
   * Check every dialog reference, memory path, expression and template up
   * front. Throws the first problem found as a `ConfigurationError`.
   */
  validate(tools: ValidationTools, rootDialogId?: string): void {
    if (rootDialogId !== undefined) this.get(rootDialogId);
    for (const dialog of this.dialogs.values()) {
      const definition = dialog.definition;
      definition.steps?.forEach((step, i) => this.validateStep(step, `${dialog.id}.steps[${i}]`, tools));
      definition.rules?.forEach((rule, i) => {
        const at = `${dialog.id}.rules[${i}]`;
        guard(at, () => {
          validateTrigger(rule.trigger);
          if (rule.priority !== undefined && !Number.isFinite(rule.priority)) {
            throw new ConfigurationError('priority must be a finite number');
          }
          if (rule.condition !== undefined) tools.evaluator.check?.(rule.condition);
        });
        rule.steps.forEach((step, j) => this.validateStep(step, `${at}.steps[${j}]`, tools));
      });
    }
  }

  private validateStep(step: Step, at: string, tools: ValidationTools): void {
    const expr = (expression: string | undefined) => {
      if (expression !== undefined) tools.evaluator.check?.(expression);
    };
    const template = (text: string | undefined) => {
      if (text !== undefined) tools.languageGenerator.check?.(text);
    };
    const path = (property: string | undefined) => {
      if (property !== undefined) parsePropertyPath(property);
    };
    const binding = (property: string | undefined) => {
      if (property !== undefined) parseBindingPath(property);
    };
    const dialogRef = (id: string) => {
      if (!this.dialogs.has(id)) throw new ConfigurationError(`references unknown dialog '${id}'`);
    };

    guard(`${at} (${step.kind})`, () => {
      switch (step.kind) {
        case 'sendActivity':
          template(step.activity);
          break;
        case 'setProperty':
          path(step.property);
          expr(step.value);
          break;
        case 'initProperty':
        case 'deleteProperty':
          path(step.property);
          break;
        case 'editArray':
          path(step.itemsProperty);
          path(step.resultProperty);
          expr(step.value);
          if ((step.changeType === 'push' || step.changeType === 'remove') && step.value === undefined) {
            throw new ConfigurationError(`'${step.changeType}' requires a value`);
          }
          break;
        case 'ifCondition':
        case 'switchCondition':
          expr(step.condition);
          break;
        case 'foreach':
          path(step.itemsProperty);
          binding(step.indexProperty);
          binding(step.valueProperty);
          break;
        case 'foreachPage':
          path(step.itemsProperty);
          binding(step.pageProperty);
          binding(step.pageIndexProperty);
          if (step.pageSize !== undefined && !(Number.isInteger(step.pageSize) && step.pageSize > 0)) {
            throw new ConfigurationError(`pageSize must be a positive integer (got ${step.pageSize})`);
          }
          break;
        case 'beginDialog':
          dialogRef(step.dialog);
          path(step.resultProperty);
          Object.values(step.options ?? {}).forEach(expr);
          Object.keys(step.options ?? {}).forEach((key) => path(`dialog.${key}`));
          break;
        case 'replaceDialog':
          dialogRef(step.dialog);
          Object.values(step.options ?? {}).forEach(expr);
          Object.keys(step.options ?? {}).forEach((key) => path(`dialog.${key}`));
          break;
        case 'endDialog':
          expr(step.value);
          break;
        case 'emitEvent':
          if (!step.eventName) throw new ConfigurationError('eventName must be non-empty');
          expr(step.eventValue);
          break;
        case 'editSteps':
          if (step.changeType !== 'endSequence' && !step.steps) {
            throw new ConfigurationError(`'${step.changeType}' requires steps`);
          }
          break;
        case 'traceActivity':
          expr(step.value);
          break;
        case 'logStep':
          template(step.text);
          break;
        case 'textInput':
        case 'numberInput':
        case 'confirmInput':
        case 'choiceInput':
          path(step.property);
          expr(step.value);
          expr(step.defaultValue);
          step.validations?.forEach(expr);
          template(step.prompt);
          template(step.unrecognizedPrompt);
          template(step.invalidPrompt);
          if (
            step.maxTurnCount !== undefined &&
            !(Number.isInteger(step.maxTurnCount) && step.maxTurnCount > 0)
          ) {
            throw new ConfigurationError(`maxTurnCount must be a positive integer`);
          }
          if (step.kind === 'choiceInput') {
            path(step.choicesProperty);
            if (!step.choices && !step.choicesProperty) {
              throw new ConfigurationError('choiceInput needs choices or choicesProperty');
            }
          }
          break;
        case 'repeatDialog':
        case 'cancelAllDialogs':
        case 'endTurn':
          break;
        default: {
          const unexpected: never = step;
          throw new ConfigurationError(`Unknown step kind: ${JSON.stringify(unexpected)}`);
        }
      }
    });

    for (const child of childStepLists(step)) {
      child.forEach((nested, i) => this.validateStep(nested, `${at}.${step.kind}[${i}]`, tools));
    }
  }
}

function validateTrigger(trigger: Trigger): void {
  switch (trigger.kind) {
    case 'intent':
      if (!trigger.intent) throw new ConfigurationError('intent trigger needs an intent name');
      return;
    case 'event':
      if (trigger.events.length === 0) throw new ConfigurationError('event trigger needs event names');
      return;
    case 'unknownIntent':
    case 'activity':
      return;
  }
}

function guard(at: string, fn: () => void): void {
  try {
    fn();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Invalid dialog ${at}: ${reason}`, { cause: error });
  }
}
