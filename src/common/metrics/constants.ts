export const METRIC_MESSAGES_TOTAL = 'order_status_messages_total';
export const METRIC_RESPONSE_LATENCY_SECONDS = 'order_status_response_latency_seconds';
export const METRIC_ORDER_RESOLUTIONS_TOTAL = 'order_status_order_resolutions_total';
export const METRIC_UPSTREAM_ATTEMPTS_TOTAL = 'order_status_upstream_attempts_total';
export const METRIC_OUTBOUND_MESSAGES_TOTAL = 'order_status_outbound_messages_total';
export const METRIC_CACHE_ENTRIES = 'order_status_cache_entries';

export const RESPONSE_LATENCY_BUCKETS = [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30] as const;
