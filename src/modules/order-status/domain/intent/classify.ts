import { findOrderCode } from '../order-code';
import { containsProfanity } from '../profanity';
import { GREETING_PATTERN, HELP_PATTERN } from './constants';
import type { Intent } from './types';

export interface ClassifyIntentOptions {
  containsProfanity?: (text: string) => boolean;
}

/**
 * Routes sanitized inbound text. Precedence: profanity, help, greeting,
 * order code, unknown. Help and greeting must match the whole text so an
 * order-code-shaped typo never shadows them.
 */
export function classifyIntent(text: string, options: ClassifyIntentOptions = {}): Intent {
  const isProfane = options.containsProfanity ?? containsProfanity;
  const trimmed = text.trim();

  if (isProfane(trimmed)) {
    return { name: 'profanity' };
  }

  if (HELP_PATTERN.test(trimmed)) {
    return { name: 'help' };
  }

  if (GREETING_PATTERN.test(trimmed)) {
    return { name: 'greeting' };
  }

  const orderCode = findOrderCode(trimmed);
  if (orderCode) {
    return { name: 'order_code', orderCode };
  }

  return { name: 'unknown' };
}
