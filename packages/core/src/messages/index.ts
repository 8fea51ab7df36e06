export { Message, MessageBase, SyncMessage, GENERAL_LEVEL, NEW_FRAME_LEVEL, DRAG_LEVEL } from './message.js';
export type { MessageInit, MessageBaseInit, Finalizer } from './message.js';
export { MessageError, MessageResponse } from './outcomes.js';
export type { MessageErrorInit, MessageResponseInit } from './outcomes.js';
