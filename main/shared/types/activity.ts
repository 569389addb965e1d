/**
 * Activities exchanged with a channel, and the events the engine derives from them.
 */

export type ActivityType = 'message' | 'conversationUpdate' | 'event' | 'trace' | 'endOfConversation';

export interface Activity {
  type: ActivityType;
  id?: string;
  text?: string;
  /** Event activities carry a name and an optional payload. */
  name?: string;
  value?: unknown;
  valueType?: string;
  locale?: string;
  timestamp?: string;
  from?: { id: string; name?: string };
  /** Transport-specific blob; passed through untouched. */
  channelData?: unknown;
}

export interface RecognizerResult {
  text: string;
  intent: string;
  score: number;
  entities: Record<string, unknown>;
}

/**
 * Names of events raised by the engine itself.
 */
export const DialogEvents = {
  recognizedIntent: 'recognizedIntent',
  unknownIntent: 'unknownIntent',
  activityReceived: 'activityReceived',
  beginDialog: 'beginDialog',
} as const;

export interface DialogEvent {
  name: string;
  value?: unknown;
  bubble: boolean;
}
