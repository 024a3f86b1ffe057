/**
 * User-facing error messages returned by the HTTP layer.
 */

export const BACKEND_ERROR_MESSAGE = 'Error procesando el mensaje.';

export const INVALID_PAYLOAD_MESSAGE = 'Payload invalido.';

export const INVALID_MESSAGE_STRUCTURE_MESSAGE = 'Estructura de mensaje no valida.';

export const EMPTY_MESSAGE_MESSAGE = 'Mensaje no valido o vacio.';

export const INVALID_CREDENTIALS_MESSAGE = 'Firma o credenciales invalidas.';

export const INVALID_ORDER_CODE_MESSAGE = 'Codigo de pedido invalido.';

export function buildOrderNotFoundMessage(orderCode: string): string {
  return `Pedido con codigo ${orderCode} no encontrado.`;
}
