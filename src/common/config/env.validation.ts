export interface AppEnv {
  NODE_ENV: 'development' | 'test' | 'production';
  PORT: number;
  LOG_LEVEL: 'debug' | 'log' | 'info' | 'warn' | 'error';
  ORDERS_API_URL: string;
  ORDERS_API_TOKEN?: string;
  ORDERS_API_CURRENCY: string;
  WHATSAPP_API_URL: string;
  WHATSAPP_TOKEN: string;
  WHATSAPP_SECRET?: string;
  WHATSAPP_VERIFY_TOKEN?: string;
  ORDER_CACHE_TTL_SECONDS: number;
  ORDER_CACHE_SWEEP_THRESHOLD: number;
  ORDER_LOOKUP_MAX_RETRIES: number;
  ORDER_LOOKUP_BACKOFF_UNIT_MS: number;
  REQUEST_TIMEOUT_MS: number;
  REQUEST_DEADLINE_MS: number;
  ADMIN_USER?: string;
  ADMIN_PASS?: string;
}

function parseNumber(value: unknown, fallback: number): number {
  if (value === undefined || value === null || value === '') {
    return fallback;
  }

  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid number value: ${String(value)}`);
  }

  return parsed;
}

function parseInteger(name: string, value: unknown, fallback: number): number {
  const parsed = parseNumber(value, fallback);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${name} must be an integer, got: ${String(value)}`);
  }

  return parsed;
}

function parseOptional(value: unknown): string | undefined {
  return String(value ?? '').trim() || undefined;
}

function parseHttpUrl(name: string, value: unknown): string {
  const raw = String(value ?? '').trim();
  if (raw.length === 0) {
    throw new Error(`${name} is required`);
  }

  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new Error(`${name} must be an absolute http(s) URL`);
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new Error(`${name} must be an absolute http(s) URL`);
  }

  return raw;
}

function parseNodeEnv(value: unknown): AppEnv['NODE_ENV'] {
  if (value === 'production' || value === 'test') {
    return value;
  }

  return 'development';
}

function parseLogLevel(value: unknown): AppEnv['LOG_LEVEL'] {
  if (
    value === 'debug' ||
    value === 'log' ||
    value === 'info' ||
    value === 'warn' ||
    value === 'error'
  ) {
    return value;
  }

  return 'log';
}

export function validateEnv(config: Record<string, unknown>): AppEnv {
  const WHATSAPP_TOKEN = String(config.WHATSAPP_TOKEN ?? '').trim();
  if (WHATSAPP_TOKEN.length === 0) {
    throw new Error('WHATSAPP_TOKEN is required');
  }

  return {
    NODE_ENV: parseNodeEnv(config.NODE_ENV),
    PORT: parseNumber(config.PORT, 8000),
    LOG_LEVEL: parseLogLevel(config.LOG_LEVEL),
    ORDERS_API_URL: parseHttpUrl('ORDERS_API_URL', config.ORDERS_API_URL),
    ORDERS_API_TOKEN: parseOptional(config.ORDERS_API_TOKEN),
    ORDERS_API_CURRENCY: parseOptional(config.ORDERS_API_CURRENCY)?.toUpperCase() ?? 'USD',
    WHATSAPP_API_URL: parseHttpUrl('WHATSAPP_API_URL', config.WHATSAPP_API_URL),
    WHATSAPP_TOKEN,
    WHATSAPP_SECRET: parseOptional(config.WHATSAPP_SECRET),
    WHATSAPP_VERIFY_TOKEN: parseOptional(config.WHATSAPP_VERIFY_TOKEN),
    ORDER_CACHE_TTL_SECONDS: Math.max(1, parseNumber(config.ORDER_CACHE_TTL_SECONDS, 300)),
    ORDER_CACHE_SWEEP_THRESHOLD: Math.max(
      1,
      parseInteger('ORDER_CACHE_SWEEP_THRESHOLD', config.ORDER_CACHE_SWEEP_THRESHOLD, 1000),
    ),
    ORDER_LOOKUP_MAX_RETRIES: Math.max(
      1,
      parseInteger('ORDER_LOOKUP_MAX_RETRIES', config.ORDER_LOOKUP_MAX_RETRIES, 3),
    ),
    ORDER_LOOKUP_BACKOFF_UNIT_MS: Math.max(
      0,
      parseNumber(config.ORDER_LOOKUP_BACKOFF_UNIT_MS, 1000),
    ),
    REQUEST_TIMEOUT_MS: Math.max(100, parseNumber(config.REQUEST_TIMEOUT_MS, 10_000)),
    REQUEST_DEADLINE_MS: Math.max(100, parseNumber(config.REQUEST_DEADLINE_MS, 30_000)),
    ADMIN_USER: parseOptional(config.ADMIN_USER),
    ADMIN_PASS: parseOptional(config.ADMIN_PASS),
  };
}
