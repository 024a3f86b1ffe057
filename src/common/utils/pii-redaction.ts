import { isRecord } from './object.utils';

const HARD_REDACT_KEYS = new Set([
  'access_token',
  'accesstoken',
  'authorization',
  'password',
  'pass',
  'token',
  'verify_token',
]);

/** Keys carrying WhatsApp numbers or requester ids derived from them. */
const PARTIAL_MASK_LAST4_KEYS = new Set([
  'from',
  'to',
  'phone',
  'telefono',
  'whatsapp',
  'sender_id',
  'senderid',
  'requester_id',
  'requesterid',
]);

const NAME_KEYS = new Set(['name', 'customer', 'cliente', 'nombre']);

const REDACTED_LITERAL = '[REDACTED]';

export function redactSensitiveData(value: unknown): unknown {
  const visited = new WeakSet<object>();
  return redactRecursive(value, undefined, visited);
}

function redactRecursive(
  value: unknown,
  key: string | undefined,
  visited: WeakSet<object>,
): unknown {
  const normalizedKey = key ? normalizeKey(key) : '';

  if (shouldHardRedact(normalizedKey)) {
    return REDACTED_LITERAL;
  }

  if (PARTIAL_MASK_LAST4_KEYS.has(normalizedKey)) {
    return maskWithLastFour(value);
  }

  if (NAME_KEYS.has(normalizedKey)) {
    return redactNameValue(value);
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactRecursive(item, key, visited));
  }

  if (isRecord(value)) {
    if (visited.has(value)) {
      return '[CIRCULAR]';
    }

    visited.add(value);
    const output: Record<string, unknown> = {};
    for (const [childKey, childValue] of Object.entries(value)) {
      output[childKey] = redactRecursive(childValue, childKey, visited);
    }
    return output;
  }

  if (typeof value === 'string') {
    return redactBearerToken(value);
  }

  return value;
}

function normalizeKey(key: string): string {
  return key.trim().toLowerCase().replace(/[^a-z0-9_]/g, '');
}

function shouldHardRedact(normalizedKey: string): boolean {
  if (normalizedKey.length === 0) {
    return false;
  }

  return (
    HARD_REDACT_KEYS.has(normalizedKey) ||
    normalizedKey.includes('secret') ||
    normalizedKey.includes('signature')
  );
}

function maskWithLastFour(value: unknown): string {
  const raw =
    typeof value === 'string'
      ? value
      : typeof value === 'number' && Number.isFinite(value)
        ? String(value)
        : '';
  const digits = raw.replace(/\D+/g, '');
  if (digits.length === 0) {
    return REDACTED_LITERAL;
  }

  return `***${digits.slice(-4)}`;
}

function redactNameValue(value: unknown): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return REDACTED_LITERAL;
  }

  return `${value.trim()[0]}***`;
}

function redactBearerToken(value: string): string {
  return value.replace(/\b(Bearer|Basic)\s+[A-Za-z0-9\-._~+/]+=*/gi, '$1 [REDACTED]');
}
