export type { OrderRecord } from './types';
