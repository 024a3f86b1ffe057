export interface InboundMessage {
  senderId: string;
  text: string;
}

export type InboundMessageExtraction =
  | { kind: 'message'; message: InboundMessage }
  | { kind: 'no_message' }
  | { kind: 'invalid'; reason: 'structure' | 'sender' | 'empty_text' };
