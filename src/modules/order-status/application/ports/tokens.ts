export const ORDER_CACHE_PORT = Symbol('ORDER_CACHE_PORT');
export const ORDER_LOOKUP_PORT = Symbol('ORDER_LOOKUP_PORT');
export const ORDER_FETCHER_PORT = Symbol('ORDER_FETCHER_PORT');
export const MESSAGE_SENDER_PORT = Symbol('MESSAGE_SENDER_PORT');
export const METRICS_PORT = Symbol('METRICS_PORT');
