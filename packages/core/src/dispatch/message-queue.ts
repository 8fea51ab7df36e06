/**
 * Reference dispatcher for messages.
 *
 * Delivers messages to every recipient in send order and drives the message
 * reference count: one reference per recipient plus one held by the queue
 * while it is delivering, so a recipient finishing early cannot finalize the
 * message before the others have it.
 *
 * Sync messages are barriers: a sync message waits until everything sent
 * before it has finalized, and nothing sent after it starts until it has
 * finalized itself.
 */

import { BusError } from '../errors/bus-error.js';
import type { Message } from '../messages/message.js';
import { MessageError } from '../messages/outcomes.js';
import { type MessageTypeRegistry, messageTypes } from '../registry/message-types.js';
import type { ModuleRef } from '../types/module.js';

export interface MessageRecipient extends ModuleRef {
  /** Message levels this recipient wants. Undefined means all of them. */
  readonly levels?: readonly number[];
  processMessage(message: Message): void | Promise<void>;
}

export interface MessageQueueEvents {
  /** Accepted by send(), before any recipient sees it */
  onMessageQueued: (message: Message) => void;
  onMessageDelivered: (message: Message, recipientCount: number) => void;
  onMessageFinalized: (message: Message) => void;
  /** An error without an exception. Logged when no handler is set. */
  onWarning: (message: Message, error: MessageError) => void;
  /** An error carrying an exception. Logged when no handler is set. */
  onFatalError: (message: Message, error: MessageError) => void;
}

export type QueueLogger = Pick<Console, 'log' | 'warn' | 'error'>;

export interface MessageQueueOptions {
  recipients?: MessageRecipient[];
  /** Registry used to reject unknown message types on send (default: process-wide) */
  registry?: MessageTypeRegistry;
  events?: Partial<MessageQueueEvents>;
  logger?: QueueLogger;
}

export class MessageQueue {
  private recipients: MessageRecipient[];
  private registry: MessageTypeRegistry;
  private events: Partial<MessageQueueEvents>;
  private logger: QueueLogger;
  private pending: Message[] = [];
  private inFlight = new Set<Message>();
  /** Sync message currently being delivered; blocks everything behind it */
  private barrier: Message | null = null;
  private pumping = false;
  private closed = false;
  private idleWaiters: Array<() => void> = [];

  constructor(options: MessageQueueOptions = {}) {
    this.recipients = [...(options.recipients ?? [])];
    this.registry = options.registry ?? messageTypes;
    this.events = options.events ?? {};
    this.logger = options.logger ?? console;
  }

  addRecipient(recipient: MessageRecipient): void {
    this.recipients.push(recipient);
  }

  removeRecipient(moduleName: string): boolean {
    const index = this.recipients.findIndex((recipient) => recipient.moduleName === moduleName);
    if (index === -1) return false;
    this.recipients.splice(index, 1);
    return true;
  }

  getRecipients(): readonly MessageRecipient[] {
    return this.recipients;
  }

  /**
   * Queue a message for delivery.
   * @throws BusError QUEUE_CLOSED after close()
   * @throws BusError MESSAGE_FINALIZED when the message was sent before
   * @throws BusError UNKNOWN_MESSAGE_TYPE for unregistered types
   */
  send(message: Message): void {
    if (this.closed) {
      throw new BusError('QUEUE_CLOSED', `Cannot send '${message.getType()}', queue is closed`, {
        messageId: message.id,
      });
    }
    if (message.isFinalized() || this.inFlight.has(message) || this.pending.includes(message)) {
      throw new BusError('MESSAGE_FINALIZED', `Message ${message.id} '${message.getType()}' was already sent`, {
        messageId: message.id,
      });
    }
    this.registry.assertValid(message.getType());
    this.pending.push(message);
    this.notify(message, 'onMessageQueued', () => this.events.onMessageQueued?.(message));
    this.pump();
  }

  /** Messages waiting for delivery */
  get pendingCount(): number {
    return this.pending.length;
  }

  /** Messages delivered but not yet finalized */
  get inFlightCount(): number {
    return this.inFlight.size;
  }

  isIdle(): boolean {
    return this.pending.length === 0 && this.inFlight.size === 0;
  }

  /** Resolves once nothing is waiting and nothing is in flight. */
  drain(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /** Refuse further sends and wait for everything already queued. */
  close(): Promise<void> {
    this.closed = true;
    return this.drain();
  }

  private pump(): void {
    if (this.pumping) return;
    this.pumping = true;
    try {
      while (this.pending.length > 0 && this.barrier === null) {
        const next = this.pending[0];
        if (next.isFinalized()) {
          // Finalized by someone else while it waited; nobody may receive it now
          this.pending.shift();
          this.logger.error(
            `[MessageQueue] Dropping ${next.id} '${next.getType()}': finalized before delivery`,
          );
          continue;
        }
        if (next.isSync() && this.inFlight.size > 0) {
          break;
        }
        this.pending.shift();
        this.deliver(next);
      }
    } finally {
      this.pumping = false;
    }
    this.notifyIfIdle();
  }

  private deliver(message: Message): void {
    const level = message.getLevel();
    const recipients = this.recipients.filter(
      (recipient) => recipient.levels === undefined || recipient.levels.includes(level),
    );

    // Queue's own reference, released once every recipient has the message
    message.incrementRefCount();
    for (let i = 0; i < recipients.length; i++) {
      message.incrementRefCount();
    }

    this.inFlight.add(message);
    if (message.isSync()) {
      this.barrier = message;
    }

    for (const recipient of recipients) {
      this.runRecipient(recipient, message);
    }
    this.notify(message, 'onMessageDelivered', () => this.events.onMessageDelivered?.(message, recipients.length));

    this.release(message);
  }

  private runRecipient(recipient: MessageRecipient, message: Message): void {
    let result: void | Promise<void>;
    try {
      result = recipient.processMessage(message);
    } catch (err: unknown) {
      this.recordFailure(recipient, message, err);
      this.release(message);
      return;
    }

    if (result instanceof Promise) {
      result
        .then(() => this.release(message))
        .catch((err: unknown) => {
          this.recordFailure(recipient, message, err);
          this.release(message);
        });
    } else {
      this.release(message);
    }
  }

  private recordFailure(recipient: MessageRecipient, message: Message, err: unknown): void {
    const exception =
      err instanceof Error
        ? err
        : new BusError('RECIPIENT_FAILED', String(err), { moduleName: recipient.moduleName });
    message.addError(new MessageError({ source: recipient.moduleName, message: exception.message, exception }));
  }

  private release(message: Message): void {
    try {
      message.decrementRefCount();
    } catch (err: unknown) {
      // Finalizer threw; the message is finalized regardless
      this.logger.error(`[MessageQueue] Finalizing ${message.id} '${message.getType()}' failed:`, err);
    }
    if (message.isFinalized() && this.inFlight.has(message)) {
      this.afterFinalize(message);
    }
  }

  private afterFinalize(message: Message): void {
    this.inFlight.delete(message);
    if (this.barrier === message) {
      this.barrier = null;
    }

    this.report(message);
    this.pump();
  }

  /** Every error is reported and onMessageFinalized always runs, whatever a handler throws. */
  private report(message: Message): void {
    for (const error of message.getErrors()) {
      if (error.hasException()) {
        this.notify(message, 'onFatalError', () => {
          if (this.events.onFatalError) {
            this.events.onFatalError(message, error);
          } else {
            this.logger.error(
              `[MessageQueue] ${error.source} failed on '${message.getType()}' from ${message.getSourceName()}: ${error.message}`,
            );
          }
        });
      } else {
        this.notify(message, 'onWarning', () => {
          if (this.events.onWarning) {
            this.events.onWarning(message, error);
          } else {
            this.logger.warn(
              `[MessageQueue] ${error.source} warning on '${message.getType()}' from ${message.getSourceName()}: ${error.message}`,
            );
          }
        });
      }
    }
    this.notify(message, 'onMessageFinalized', () => this.events.onMessageFinalized?.(message));
  }

  private notify(message: Message, event: keyof MessageQueueEvents, handler: () => void): void {
    try {
      handler();
    } catch (err: unknown) {
      this.logger.error(`[MessageQueue] ${event} for ${message.id} '${message.getType()}' failed:`, err);
    }
  }

  private notifyIfIdle(): void {
    if (!this.isIdle() || this.idleWaiters.length === 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
