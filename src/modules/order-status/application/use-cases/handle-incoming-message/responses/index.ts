export {
  GREETING_REPLY,
  HELP_REPLY,
  PROFANITY_WARNING_REPLY,
  UNKNOWN_REPLY,
  buildOrderFoundReply,
  buildOrderNotFoundReply,
} from './reply-templates';
