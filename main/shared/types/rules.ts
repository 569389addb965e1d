import type { ActivityType } from './activity';
import type { Expression, Step } from './steps';

export type IntentTrigger = {
  kind: 'intent';
  intent: string;
  /** Entity names the recognizer must have produced. */
  entities?: string[];
};

/** Catch-all for any utterance: fires on recognized and unrecognized input alike. */
export type UnknownIntentTrigger = {
  kind: 'unknownIntent';
};

export type EventTrigger = {
  kind: 'event';
  events: string[];
};

export type ActivityTrigger = {
  kind: 'activity';
  activityType: ActivityType;
};

export type Trigger = IntentTrigger | UnknownIntentTrigger | EventTrigger | ActivityTrigger;

export type TriggerKind = Trigger['kind'];

export interface Rule {
  trigger: Trigger;
  condition?: Expression;
  /** Higher wins; defaults to 0. */
  priority?: number;
  steps: Step[];
}
