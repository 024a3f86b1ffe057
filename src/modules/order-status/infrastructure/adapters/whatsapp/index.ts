export { WhatsappCloudSenderAdapter } from './whatsapp-cloud-sender.adapter';
