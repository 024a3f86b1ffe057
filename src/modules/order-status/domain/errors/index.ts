export { ExternalServiceError, type ExternalServiceName } from './external-service.error';
export { MalformedOrderPayloadError } from './malformed-order-payload.error';
