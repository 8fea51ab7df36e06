export {
  BUILTIN_MESSAGE_TYPES,
  MessageTypeRegistry,
  messageTypes,
  addMessage,
  isValidMessageType,
  assertValidMessageType,
} from './message-types.js';
