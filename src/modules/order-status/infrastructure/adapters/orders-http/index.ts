export { OrdersHttpClient } from './orders-http.client';
export { RetryingOrderLookupClient } from './retrying-order-lookup.client';
export { parseOrderPayload, type ParseOrderPayloadInput } from './order-payload-parser';
