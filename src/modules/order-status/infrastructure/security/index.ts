export { AdminBasicAuthGuard, parseBasicAuthorization } from './admin-basic-auth.guard';
export { secureEquals } from './crypto-helpers';
export { HEADER_WHATSAPP_SIGNATURE, WhatsappSignatureGuard } from './whatsapp-signature.guard';
