export type { Money } from './types';
export { formatMoney } from './format';
export { parseMoney } from './parse';
