import type { IntentName } from '../domain/intent';

export type WebhookResponse =
  | { ok: true; intent: IntentName; delivered: boolean }
  | { ok: true; ignored: true };
