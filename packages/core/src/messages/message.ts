import { type DiagnosticSink, type LifecycleEventName, getDiagnosticSink } from '../diagnostics/diagnostic-sink.js';
import { BusError } from '../errors/bus-error.js';
import type { ModuleRef } from '../types/module.js';
import type { MessageError, MessageResponse } from './outcomes.js';

/**
 * Message levels by convention:
 *  1. General messages
 *  2. New frame messages
 *  3. Joystick / mouse drag messages
 *
 * Only level 1 messages are logged. High-volume traffic that concerns one or two
 * modules should use another level so uninterested modules can skip it quickly.
 */
export const GENERAL_LEVEL = 1;
export const NEW_FRAME_LEVEL = 2;
export const DRAG_LEVEL = 3;

export type Finalizer = () => void;

export interface MessageBaseInit {
  /** Space separated lower case string, e.g. 'new parameters file' */
  type: string;
  source: ModuleRef;
}

export interface MessageInit<T = unknown> extends MessageBaseInit {
  data?: T;
  /** Process every message queued before this one before continuing to it */
  sync?: boolean;
  level?: number;
  /** Called once the message has been processed by every recipient */
  finalizer?: Finalizer;
  /** Defaults to the process-wide sink at construction time */
  sink?: DiagnosticSink;
}

let nextMessageId = 1;

function allocateMessageId(): string {
  return `msg-${nextMessageId++}`;
}

export class MessageBase {
  protected readonly type: string;
  protected readonly source: ModuleRef;

  constructor(init: MessageBaseInit) {
    this.type = init.type;
    this.source = init.source;
  }

  getType(): string {
    return this.type;
  }

  getSource(): ModuleRef {
    return this.source;
  }

  getSourceName(): string {
    return this.source.moduleName;
  }
}

export class Message<T = unknown> extends MessageBase {
  readonly id: string;
  private readonly data: Readonly<T> | undefined;
  private readonly sync: boolean;
  private readonly level: number;
  private readonly sink: DiagnosticSink;
  private finalizer: Finalizer | null;
  private readonly errors: MessageError[] = [];
  private readonly responses: MessageResponse[] = [];
  private refCount = 0;
  private finalized = false;

  constructor(init: MessageInit<T>) {
    super(init);
    this.id = allocateMessageId();
    this.data = init.data;
    this.sync = init.sync ?? false;
    this.level = init.level ?? GENERAL_LEVEL;
    this.finalizer = init.finalizer ?? null;
    this.sink = init.sink ?? getDiagnosticSink();

    if (this.level === GENERAL_LEVEL) {
      this.logEvent('created');
    }
  }

  addError(error: MessageError): void {
    this.errors.push(error);
  }

  addResponse(response: MessageResponse): void {
    this.responses.push(response);
  }

  getData(): Readonly<T> | undefined {
    return this.data;
  }

  getErrors(): readonly MessageError[] {
    return this.errors;
  }

  getResponses(): readonly MessageResponse[] {
    return this.responses;
  }

  hasErrors(): boolean {
    return this.errors.length > 0;
  }

  hasResponses(): boolean {
    return this.responses.length > 0;
  }

  /** Errors carrying an exception the sender must raise if it can't handle them. */
  getFatalErrors(): MessageError[] {
    return this.errors.filter((error) => error.hasException());
  }

  hasFatalErrors(): boolean {
    return this.errors.some((error) => error.hasException());
  }

  getWarnings(): MessageError[] {
    return this.errors.filter((error) => !error.hasException());
  }

  getLevel(): number {
    return this.level;
  }

  isSync(): boolean {
    return this.sync;
  }

  getRefCount(): number {
    return this.refCount;
  }

  isFinalized(): boolean {
    return this.finalized;
  }

  /**
   * Account for one more recipient. Dispatchers call this before delivering,
   * once per recipient.
   */
  incrementRefCount(): void {
    if (this.finalized) {
      throw new BusError('MESSAGE_FINALIZED', `Message ${this.id} (${this.type}) is already finalized`, {
        messageId: this.id,
      });
    }
    this.refCount++;
  }

  /**
   * One recipient is done. Finalizes the message when the last reference goes away.
   * @returns true if this call finalized the message
   */
  decrementRefCount(): boolean {
    if (this.refCount === 0) {
      throw new BusError('REF_COUNT_UNDERFLOW', `Message ${this.id} (${this.type}) has no pending recipients`, {
        messageId: this.id,
      });
    }
    this.refCount--;
    if (this.refCount > 0) {
      return false;
    }
    this.finalize();
    return true;
  }

  /**
   * Runs once all recipients have processed the message: logs level 1 messages,
   * then calls the finalizer and drops it.
   */
  finalize(): void {
    if (this.finalized) {
      throw new BusError('MESSAGE_FINALIZED', `Message ${this.id} (${this.type}) is already finalized`, {
        messageId: this.id,
      });
    }
    this.finalized = true;

    if (this.level === GENERAL_LEVEL) {
      this.logEvent('destroyed');
    }

    const finalizer = this.finalizer;
    this.finalizer = null;
    finalizer?.();
  }

  private logEvent(event: LifecycleEventName): void {
    this.sink.record({
      event,
      messageId: this.id,
      sourceName: this.getSourceName(),
      messageType: this.type,
    });
  }
}

/**
 * A message whose sole purpose is to hold up the queue until everything
 * before it is processed. Use sparingly.
 */
export class SyncMessage extends Message<undefined> {
  static readonly TYPE = 'sync';

  constructor(source: ModuleRef, sink?: DiagnosticSink) {
    super({ type: SyncMessage.TYPE, source, sync: true, sink });
  }
}
