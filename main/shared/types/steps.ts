/**
 * Step definitions. A step is immutable dialog configuration; the executor
 * dispatches on `kind` with an exhaustive switch.
 *
 * Field conventions:
 * - `Expression`: evaluated by the expression evaluator against memory
 * - `PropertyPath`: a memory path written or read directly
 * - `Template`: text resolved by the language generator
 */

export type Expression = string;
export type PropertyPath = string;
export type Template = string;

export type ListStyle = 'inline' | 'list' | 'none';

export type ChoiceOption = string | { value: string; synonyms?: string[] };

export type SendActivityStep = {
  kind: 'sendActivity';
  activity: Template;
};

export type SetPropertyStep = {
  kind: 'setProperty';
  property: PropertyPath;
  value: Expression;
};

export type InitPropertyStep = {
  kind: 'initProperty';
  property: PropertyPath;
  type: 'object' | 'array';
};

export type DeletePropertyStep = {
  kind: 'deleteProperty';
  property: PropertyPath;
};

export type EditArrayChange = 'push' | 'pop' | 'take' | 'remove' | 'clear';

export type EditArrayStep = {
  kind: 'editArray';
  changeType: EditArrayChange;
  itemsProperty: PropertyPath;
  /** Pushed or removed value; required for `push` and `remove`. */
  value?: Expression;
  /** Receives the popped/taken item, or whether `remove` found the value. */
  resultProperty?: PropertyPath;
};

export type IfConditionStep = {
  kind: 'ifCondition';
  condition: Expression;
  steps: Step[];
  elseSteps?: Step[];
};

export type SwitchCase = {
  value: string;
  steps: Step[];
};

export type SwitchConditionStep = {
  kind: 'switchCondition';
  condition: Expression;
  cases: SwitchCase[];
  default?: Step[];
};

export type ForeachStep = {
  kind: 'foreach';
  itemsProperty: PropertyPath;
  indexProperty?: PropertyPath;
  valueProperty?: PropertyPath;
  steps: Step[];
};

export type ForeachPageStep = {
  kind: 'foreachPage';
  itemsProperty: PropertyPath;
  pageSize?: number;
  pageProperty?: PropertyPath;
  pageIndexProperty?: PropertyPath;
  steps: Step[];
};

export type BeginDialogStep = {
  kind: 'beginDialog';
  dialog: string;
  /** Child `dialog` scope entries, each evaluated in the caller. */
  options?: Record<string, Expression>;
  resultProperty?: PropertyPath;
};

export type ReplaceDialogStep = {
  kind: 'replaceDialog';
  dialog: string;
  options?: Record<string, Expression>;
};

export type EndDialogStep = {
  kind: 'endDialog';
  value?: Expression;
};

export type RepeatDialogStep = {
  kind: 'repeatDialog';
};

export type CancelAllDialogsStep = {
  kind: 'cancelAllDialogs';
};

export type EndTurnStep = {
  kind: 'endTurn';
};

export type EmitEventStep = {
  kind: 'emitEvent';
  eventName: string;
  eventValue?: Expression;
  bubbleEvent?: boolean;
};

export type EditStepsChange = 'replaceSequence' | 'insertSteps' | 'appendSteps' | 'endSequence';

export type EditStepsStep = {
  kind: 'editSteps';
  changeType: EditStepsChange;
  steps?: Step[];
};

export type TraceActivityStep = {
  kind: 'traceActivity';
  name?: string;
  /** `memory` sends a snapshot of every scope. */
  valueType?: string;
  value?: Expression;
};

export type LogStep = {
  kind: 'logStep';
  text: Template;
  traceActivity?: boolean;
};

export type InputStepBase = {
  property: PropertyPath;
  prompt?: Template;
  unrecognizedPrompt?: Template;
  invalidPrompt?: Template;
  /** Expressions over `turn.value`; all must hold. */
  validations?: Expression[];
  /** Initial value; when it yields something the prompt is skipped. */
  value?: Expression;
  alwaysPrompt?: boolean;
  maxTurnCount?: number;
  defaultValue?: Expression;
};

export type TextInputStep = InputStepBase & {
  kind: 'textInput';
  outputFormat?: 'none' | 'trim' | 'lowercase' | 'uppercase';
};

export type NumberInputStep = InputStepBase & {
  kind: 'numberInput';
  outputFormat?: 'float' | 'integer';
};

export type ConfirmInputStep = InputStepBase & {
  kind: 'confirmInput';
  style?: ListStyle;
};

export type ChoiceInputStep = InputStepBase & {
  kind: 'choiceInput';
  choices?: ChoiceOption[];
  choicesProperty?: PropertyPath;
  style?: ListStyle;
  outputFormat?: 'value' | 'index';
};

export type InputStep = TextInputStep | NumberInputStep | ConfirmInputStep | ChoiceInputStep;

export type Step =
  | SendActivityStep
  | SetPropertyStep
  | InitPropertyStep
  | DeletePropertyStep
  | EditArrayStep
  | IfConditionStep
  | SwitchConditionStep
  | ForeachStep
  | ForeachPageStep
  | BeginDialogStep
  | ReplaceDialogStep
  | EndDialogStep
  | RepeatDialogStep
  | CancelAllDialogsStep
  | EndTurnStep
  | EmitEventStep
  | EditStepsStep
  | TraceActivityStep
  | LogStep
  | InputStep;

export type StepKind = Step['kind'];

export function isInputStep(step: Step): step is InputStep {
  return (
    step.kind === 'textInput' ||
    step.kind === 'numberInput' ||
    step.kind === 'confirmInput' ||
    step.kind === 'choiceInput'
  );
}
