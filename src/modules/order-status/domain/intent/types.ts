export const INTENT_NAMES = ['profanity', 'help', 'greeting', 'order_code', 'unknown'] as const;

export type IntentName = (typeof INTENT_NAMES)[number];

export type Intent =
  | { name: 'profanity' }
  | { name: 'help' }
  | { name: 'greeting' }
  | { name: 'order_code'; orderCode: string }
  | { name: 'unknown' };
