import { formatMoney } from '../../../../domain/money';
import type { OrderRecord } from '../../../../domain/order';

export const PROFANITY_WARNING_REPLY =
  '⚠️ *Lenguaje inapropiado detectado*\n\n' +
  'Por favor mantené un tono respetuoso.\n' +
  'Estoy acá para ayudarte con tu pedido.';

export const GREETING_REPLY =
  '¡Hola! 👋 Soy tu asistente virtual.\n\n' +
  'Para consultar tu pedido, enviá tu *código de seguimiento*.\n' +
  'Ejemplo: `PED-123`\n\n' +
  'También podés escribir *ayuda* para más información.';

export const HELP_REPLY =
  '🤖 *Comandos disponibles:*\n\n' +
  '• `hola` - Saludo inicial\n' +
  '• `XXX-123` - Consultar pedido\n' +
  '• `ayuda` - Mostrar esta ayuda\n\n' +
  'Ejemplos de códigos:\n' +
  '• `PED-123`\n' +
  '• `ORD-456`\n' +
  '• `FAC-789`';

export const UNKNOWN_REPLY =
  '🔍 *No reconozco tu solicitud*\n\n' +
  'Enviá tu *código de seguimiento* (ej: `PED-123`)\n' +
  'o escribí *hola* para comenzar.\n' +
  'Para ayuda, escribí *ayuda*.';

const MISSING_FIELD = '-';

export function buildOrderFoundReply(order: OrderRecord): string {
  return [
    '📦 *Estado de tu pedido* 📦',
    '',
    `• Código: ${order.code}`,
    `• Producto: ${order.product || MISSING_FIELD}`,
    `• Estado: ${order.status}`,
    `• Fecha: ${order.updatedAt ?? MISSING_FIELD}`,
    `• Cliente: ${order.customer ?? MISSING_FIELD}`,
    `• Total: ${order.totalAmount ? `$${formatMoney(order.totalAmount)}` : MISSING_FIELD}`,
    '',
    '¿Necesitás más ayuda? Escribí *ayuda* para ver las opciones.',
  ].join('\n');
}

export function buildOrderNotFoundReply(input: { orderCode: string; requesterId: string }): string {
  return (
    '❌ *Pedido no encontrado*\n\n' +
    `Usuario: ${input.requesterId}\n` +
    `Código: ${input.orderCode}\n\n` +
    'Verificá los datos e intentá nuevamente.'
  );
}
