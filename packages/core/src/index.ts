export const INSTRUMENT_BUS_VERSION = '0.1.0';

export { BusError, isBusError } from './errors/index.js';
export type { BusErrorCode } from './errors/index.js';

export type { ModuleRef } from './types/index.js';

export {
  BUILTIN_MESSAGE_TYPES,
  MessageTypeRegistry,
  messageTypes,
  addMessage,
  isValidMessageType,
  assertValidMessageType,
} from './registry/index.js';

export {
  Message,
  MessageBase,
  SyncMessage,
  MessageError,
  MessageResponse,
  GENERAL_LEVEL,
  NEW_FRAME_LEVEL,
  DRAG_LEVEL,
} from './messages/index.js';
export type {
  MessageInit,
  MessageBaseInit,
  Finalizer,
  MessageErrorInit,
  MessageResponseInit,
} from './messages/index.js';

// Lifecycle audit trail
export {
  formatLifecycleEvent,
  silentDiagnosticSink,
  consoleDiagnosticSink,
  createConsoleSink,
  createMemorySink,
  getDiagnosticSink,
  setDiagnosticSink,
} from './diagnostics/index.js';
export type {
  LifecycleEvent,
  LifecycleEventName,
  DiagnosticSink,
  DiagnosticLogger,
  MemorySink,
} from './diagnostics/index.js';

// Reference dispatcher
export { MessageQueue } from './dispatch/index.js';
export type { MessageRecipient, MessageQueueEvents, MessageQueueOptions, QueueLogger } from './dispatch/index.js';
