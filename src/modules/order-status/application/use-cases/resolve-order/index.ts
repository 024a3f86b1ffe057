export { ResolveOrderUseCase, type ResolveOrderInput } from './resolve-order.use-case';
