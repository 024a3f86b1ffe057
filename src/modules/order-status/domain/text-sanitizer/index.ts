export { MAX_INBOUND_TEXT_CHARS, sanitizeText } from './sanitize';
