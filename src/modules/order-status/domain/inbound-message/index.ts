export { SENDER_ID_PATTERN, extractInboundMessage } from './extract';
export type { InboundMessage, InboundMessageExtraction } from './types';
