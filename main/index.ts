export { ActivityStream, ActivitySubscription } from './activity-stream';
export { EventBubbler, type BubbleOffer, type BubbleOutcome } from './bubbler';
export { InProcessChannel, type ActivitySender } from './channel';
export {
  DEFAULT_CHOICE_LOCALES,
  formatChoicePrompt,
  recognizeChoice,
  recognizeConfirm,
  resolveChoiceOptions,
  type ChoiceLocaleOptions,
  type ChoiceLocaleTable,
} from './choices';
export { DEFAULT_ENGINE_CONFIG, ENGINE_ENV_KEYS, loadEngineConfig, resolveEngineConfig, type EngineConfig } from './config';
export { ConversationLocks, ConversationMutex } from './conversation-mutex';
export {
  loadDialogsFile,
  parseDialogsDocument,
  parseDialogsYaml,
  type DeclarativeDialogs,
} from './declarative';
export { CompiledDialog, DialogSet, type DialogDefinition, type RecognizerConfig } from './dialog';
export { DialogInstance, DialogStack } from './dialog-stack';
export { readEngineEnvironment, type EngineEnvironment, type EnvFileIssue } from './env-file';
export {
  ConfigurationError,
  DialogExecutionError,
  EvaluationError,
  TransportError,
  TurnAbortedError,
  TurnstackError,
  isTurnstackError,
} from './errors';
export { parseExpression, ExpressionParseError } from './expr/parse';
export { DefaultExpressionEvaluator, isTruthy, type ExpressionEvaluator } from './expr/evaluate';
export { TemplateLanguageGenerator, type LanguageGenerator } from './lg';
export { Logger, createLogger, log, setDefaultLogLevel, type LogLevel } from './log';
export { DialogManager, TurnRunner, type DialogManagerOptions, type ProcessTurnOptions } from './manager';
export { selectRule, type RuleMatch } from './matcher';
export { DialogMemory, MEMORY_SCOPES, parsePropertyPath, type MemoryScopeName } from './memory';
export { DiskFileStorage, MemoryStorage, type ConversationStorage } from './persistence';
export { NONE_INTENT, RegexRecognizer, type Recognizer } from './recognizers';
export * from './shared/types';
export { createTurnContext, type TurnContext } from './turn-context';
