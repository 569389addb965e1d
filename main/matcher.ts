/**
 * Module: matcher
 *
 * Picks the rule that handles an event: highest priority, then the most
 * specific trigger, then the earliest registered.
 */
import type { ExpressionEvaluator } from './expr/evaluate';
import { isTruthy } from './expr/evaluate';
import type { MemoryReader } from './memory';
import { isRecord } from './memory';
import { DialogEvents, type DialogEvent } from './shared/types/activity';
import type { Rule, Trigger } from './shared/types/rules';

export type RuleMatch = {
  rule: Rule;
  /** Registration index within the dialog's rule list. */
  index: number;
};

export type SelectRuleOptions = {
  /** Ignore catch-all rules, e.g. while the dialog still has queued steps. */
  excludeCatchAll?: boolean;
};

export function isCatchAll(trigger: Trigger): boolean {
  return trigger.kind === 'unknownIntent';
}

/** Concrete trigger 2, catch-all 0; a condition adds 1. */
export function ruleSpecificity(rule: Rule): number {
  return (isCatchAll(rule.trigger) ? 0 : 2) + (rule.condition ? 1 : 0);
}

function recognizedIntentOf(event: DialogEvent): { intent: string; entities: Record<string, unknown> } | undefined {
  if (event.name !== DialogEvents.recognizedIntent || !isRecord(event.value)) return undefined;
  const { intent, entities } = event.value;
  if (typeof intent !== 'string') return undefined;
  return { intent, entities: isRecord(entities) ? entities : {} };
}

export function triggerMatches(trigger: Trigger, event: DialogEvent): boolean {
  switch (trigger.kind) {
    case 'intent': {
      const recognized = recognizedIntentOf(event);
      if (!recognized || recognized.intent !== trigger.intent) return false;
      return (trigger.entities ?? []).every((name) => recognized.entities[name] !== undefined);
    }
    case 'unknownIntent':
      return event.name === DialogEvents.unknownIntent || event.name === DialogEvents.recognizedIntent;
    case 'event':
      return trigger.events.includes(event.name);
    case 'activity':
      return (
        event.name === DialogEvents.activityReceived &&
        isRecord(event.value) &&
        event.value.type === trigger.activityType
      );
    default: {
      const unexpected: never = trigger;
      throw new Error(`Unhandled trigger kind: ${String(unexpected)}`);
    }
  }
}

export function selectRule(
  rules: ReadonlyArray<Rule>,
  event: DialogEvent,
  memory: MemoryReader,
  evaluator: ExpressionEvaluator,
  options?: SelectRuleOptions,
): RuleMatch | undefined {
  let best: RuleMatch | undefined;
  let bestPriority = 0;
  let bestSpecificity = 0;

  for (let index = 0; index < rules.length; index++) {
    const rule = rules[index];
    if (options?.excludeCatchAll && isCatchAll(rule.trigger)) continue;
    if (!triggerMatches(rule.trigger, event)) continue;
    if (rule.condition && !isTruthy(evaluator.evaluate(rule.condition, memory))) continue;

    const priority = rule.priority ?? 0;
    const specificity = ruleSpecificity(rule);
    if (
      !best ||
      priority > bestPriority ||
      (priority === bestPriority && specificity > bestSpecificity)
    ) {
      best = { rule, index };
      bestPriority = priority;
      bestSpecificity = specificity;
    }
  }
  return best;
}
