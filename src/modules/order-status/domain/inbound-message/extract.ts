import { isRecord } from '@/common/utils/object.utils';
import type { InboundMessageExtraction } from './types';

export const SENDER_ID_PATTERN = /^\+?\d{10,15}$/;

/**
 * Pulls `(senderId, text)` out of a WhatsApp Cloud webhook body
 * (`entry[0].changes[0].value.messages[0]`). A change without messages
 * (delivery/read status callbacks) yields `no_message`.
 */
export function extractInboundMessage(body: unknown): InboundMessageExtraction {
  const value = firstRecord(firstRecord(isRecord(body) ? body.entry : undefined)?.changes)?.value;
  if (!isRecord(value)) {
    return { kind: 'invalid', reason: 'structure' };
  }

  if (value.messages === undefined && value.statuses !== undefined) {
    return { kind: 'no_message' };
  }

  const message = firstRecord(value.messages);
  if (!message) {
    return { kind: 'invalid', reason: 'structure' };
  }

  const senderId = typeof message.from === 'string' ? message.from.trim() : '';
  if (!SENDER_ID_PATTERN.test(senderId)) {
    return { kind: 'invalid', reason: 'sender' };
  }

  const text = resolveText(message.text);
  if (text.length === 0) {
    return { kind: 'invalid', reason: 'empty_text' };
  }

  return { kind: 'message', message: { senderId, text } };
}

function firstRecord(value: unknown): Record<string, unknown> | undefined {
  if (!Array.isArray(value) || value.length === 0) {
    return undefined;
  }

  const first: unknown = value[0];
  return isRecord(first) ? first : undefined;
}

function resolveText(raw: unknown): string {
  if (isRecord(raw)) {
    return typeof raw.body === 'string' ? raw.body.trim() : '';
  }

  if (typeof raw === 'string' || typeof raw === 'number') {
    return String(raw).trim();
  }

  return '';
}
