export { classifyIntent, type ClassifyIntentOptions } from './classify';
export { GREETING_PATTERN, HELP_PATTERN } from './constants';
export { INTENT_NAMES, type Intent, type IntentName } from './types';
