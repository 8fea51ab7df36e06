export { MessageQueue } from './message-queue.js';
export type { MessageRecipient, MessageQueueEvents, MessageQueueOptions, QueueLogger } from './message-queue.js';
