export {
  HandleIncomingMessageUseCase,
  type HandleIncomingMessageInput,
  type HandleIncomingMessageResult,
} from './handle-incoming-message.use-case';
