/**
 * Module: bubbler
 *
 * Re-offers an event nobody handled to the dialogs below the one that raised
 * it, nearest caller first, until one of them has a matching rule.
 */
import type { DialogInstance, DialogStack } from './dialog-stack';
import type { ExpressionEvaluator } from './expr/evaluate';
import type { Logger } from './log';
import { selectRule, type RuleMatch } from './matcher';
import type { MemoryReader } from './memory';
import type { DialogEvent } from './shared/types/activity';

export type BubbleOutcome =
  | { consumed: true; index: number; match: RuleMatch; event: DialogEvent }
  | { consumed: false };

export type BubbleOffer = Readonly<{
  /** Name used in logs and in the turn's unhandled list. */
  name: string;
  /** The event as this particular dialog sees it; every call must return a fresh copy. */
  eventFor: (instance: DialogInstance) => Promise<DialogEvent>;
  memoryFor: (instance: DialogInstance) => MemoryReader;
}>;

export class EventBubbler {
  constructor(
    private readonly evaluator: ExpressionEvaluator,
    private readonly logger: Logger,
  ) {}

  /**
   * Walk from `fromIndex` down to the root. Ancestors always have queued work
   * (at least the parked begin step), so catch-all rules only apply to a
   * dialog whose cursor is empty.
   */
  async bubble(stack: DialogStack, fromIndex: number, offer: BubbleOffer): Promise<BubbleOutcome> {
    for (let index = Math.min(fromIndex, stack.topIndex); index >= 0; index--) {
      const instance = stack.at(index);
      if (!instance) continue;
      const event = await offer.eventFor(instance);
      const match = selectRule(instance.dialog.rules, event, offer.memoryFor(instance), this.evaluator, {
        excludeCatchAll: instance.pending,
      });
      if (match) {
        this.logger.debug(
          `Event '${event.name}' consumed by dialog '${instance.dialogId}' (rule #${match.index}) at depth ${index}`,
        );
        return { consumed: true, index, match, event };
      }
    }
    this.logger.debug(`Event '${offer.name}' found no handler below depth ${fromIndex + 1}`);
    return { consumed: false };
  }
}
