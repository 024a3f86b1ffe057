export { ORDER_CODE_PATTERN, findOrderCode, isOrderCode, normalizeOrderCode } from './normalize';
