import { isRecord, pickFirstDefined } from '@/common/utils/object.utils';
import { resolveOptionalString } from '@/common/utils/string.utils';
import { MalformedOrderPayloadError } from '@/modules/order-status/domain/errors';
import { parseMoney } from '@/modules/order-status/domain/money';
import type { OrderRecord } from '@/modules/order-status/domain/order';
import { normalizeOrderCode } from '@/modules/order-status/domain/order-code';

const REQUESTERS_KEY = 'pedidos';
const REQUESTER_ORDERS_KEY = 'datos_pedido';

const ORDER_CODE_KEYS = ['codigo', 'code'] as const;
const ORDER_ID_KEYS = ['id_pedido', 'id'] as const;
const STATUS_KEYS = ['estado', 'status'] as const;
const UPDATED_AT_KEYS = ['fecha', 'fechaActualizacion', 'updated_at', 'updatedAt'] as const;
const CUSTOMER_KEYS = ['cliente', 'customer'] as const;
const TOTAL_KEYS = ['precio_total_pedido', 'precio_total', 'total'] as const;
const PRODUCT_KEYS = ['producto', 'product'] as const;
const ITEM_NAME_KEYS = ['producto', 'name', 'nombre'] as const;

export interface ParseOrderPayloadInput {
  orderCode: string;
  requesterId: string;
  defaultCurrency: string;
}

/**
 * Reads one order out of an order API response body.
 *
 * Two shapes are accepted:
 * - nested, `{ pedidos: [{ user_id, datos_pedido: [order, ...] }] }`: the
 *   requester is matched on `user_id` (as given or as an integer) and the
 *   order on its id or code. Every matching requester entry is searched in
 *   order; the first matching order wins, no match yields null.
 * - direct: the body (or its `pedido` / `order` object) is the order.
 *
 * @throws MalformedOrderPayloadError when the body is not an object or the
 *   matched order lacks a required field
 */
export function parseOrderPayload(
  body: unknown,
  input: ParseOrderPayloadInput,
): OrderRecord | null {
  if (!isRecord(body)) {
    throw new MalformedOrderPayloadError('response body is not an object');
  }

  if (REQUESTERS_KEY in body) {
    const rawOrder = findNestedOrder(body[REQUESTERS_KEY], input);
    return rawOrder ? buildOrderRecord(rawOrder, input) : null;
  }

  const container = isRecord(body.pedido) ? body.pedido : isRecord(body.order) ? body.order : body;
  return buildOrderRecord(container, input);
}

function findNestedOrder(
  requesters: unknown,
  input: ParseOrderPayloadInput,
): Record<string, unknown> | undefined {
  if (!Array.isArray(requesters)) {
    throw new MalformedOrderPayloadError(`"${REQUESTERS_KEY}" is not a list`);
  }

  const wantedCode = normalizeOrderCode(input.orderCode);
  for (const requester of requesters) {
    if (!isRecord(requester) || !matchesRequester(requester.user_id, input.requesterId)) {
      continue;
    }

    const orders = requester[REQUESTER_ORDERS_KEY];
    if (!Array.isArray(orders)) {
      continue;
    }

    const order = orders.find(
      (candidate): candidate is Record<string, unknown> =>
        isRecord(candidate) && matchesOrderCode(candidate, wantedCode),
    );
    if (order) {
      return order;
    }
  }

  return undefined;
}

function matchesRequester(userId: unknown, requesterId: string): boolean {
  if (userId === undefined || userId === null) {
    return false;
  }

  if (String(userId) === requesterId) {
    return true;
  }

  const requesterAsInteger = parseInteger(requesterId);
  const userIdAsInteger = typeof userId === 'number' ? userId : parseInteger(String(userId));

  return (
    requesterAsInteger !== undefined &&
    userIdAsInteger !== undefined &&
    requesterAsInteger === userIdAsInteger
  );
}

function parseInteger(value: string): number | undefined {
  const trimmed = value.trim();
  return /^[+-]?\d+$/.test(trimmed) ? Number(trimmed) : undefined;
}

function matchesOrderCode(order: Record<string, unknown>, wantedCode: string): boolean {
  return [...ORDER_ID_KEYS, ...ORDER_CODE_KEYS].some((key) => {
    const value = order[key];
    return (
      (typeof value === 'string' || typeof value === 'number') &&
      normalizeOrderCode(String(value)) === wantedCode
    );
  });
}

function buildOrderRecord(
  order: Record<string, unknown>,
  input: ParseOrderPayloadInput,
): OrderRecord {
  const status = resolveOptionalString(pickFirstDefined(order, STATUS_KEYS));
  if (!status) {
    throw new MalformedOrderPayloadError('missing order status');
  }

  const code =
    readScalar(pickFirstDefined(order, ORDER_CODE_KEYS)) ??
    readScalar(pickFirstDefined(order, ORDER_ID_KEYS)) ??
    normalizeOrderCode(input.orderCode);

  const rawTotal = pickFirstDefined(order, TOTAL_KEYS);
  const totalAmount =
    rawTotal === undefined ? undefined : parseMoney(rawTotal, input.defaultCurrency);
  if (rawTotal !== undefined && !totalAmount) {
    throw new MalformedOrderPayloadError('unreadable order total');
  }

  const updatedAt = readScalar(pickFirstDefined(order, UPDATED_AT_KEYS));
  const customer = resolveOptionalString(pickFirstDefined(order, CUSTOMER_KEYS));

  return {
    code,
    status,
    product: resolveProduct(order),
    ...(updatedAt ? { updatedAt } : {}),
    ...(customer ? { customer } : {}),
    ...(totalAmount ? { totalAmount } : {}),
  };
}

function resolveProduct(order: Record<string, unknown>): string {
  const items = order.items;
  if (items === undefined || items === null) {
    return resolveOptionalString(pickFirstDefined(order, PRODUCT_KEYS)) ?? '';
  }

  if (!Array.isArray(items)) {
    throw new MalformedOrderPayloadError('order items is not a list');
  }

  return items
    .map((item: unknown) => {
      const name = isRecord(item)
        ? resolveOptionalString(pickFirstDefined(item, ITEM_NAME_KEYS))
        : undefined;
      if (!name) {
        throw new MalformedOrderPayloadError('order item without a product name');
      }
      return name;
    })
    .join(', ');
}

function readScalar(value: unknown): string | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }

  return resolveOptionalString(value);
}
