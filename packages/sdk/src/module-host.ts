import {
  BusError,
  type DiagnosticSink,
  Message,
  type MessageError,
  MessageQueue,
  type MessageTypeRegistry,
  type ModuleRef,
  type QueueLogger,
  SyncMessage,
  createConsoleSink,
  getDiagnosticSink,
  messageTypes,
  setDiagnosticSink,
  silentDiagnosticSink,
} from 'instrument-bus';
import type { BusModule, MessageSender } from './bus-module.js';
import { resolveHostConfig } from './host-config.js';

/** Sent in order at start-up, each fully processed before the next. */
export const STARTUP_SEQUENCE = ['configure1', 'configure2', 'start'] as const;

export const CLOSE_EVENT = 'close event';

export interface ModuleHostOptions {
  modules?: BusModule[];
  registry?: MessageTypeRegistry;
  /** Lifecycle event sink; installed process-wide while the host is open */
  sink?: DiagnosticSink;
  logger?: QueueLogger;
  /** Environment used for configuration (default: process.env) */
  env?: Record<string, string | undefined>;
}

export type StatusHandler = (status: string, detail?: string) => void;
export type FatalErrorHandler = (message: Message, error: MessageError) => void;

export interface ConfigureData {
  moduleNames: string[];
}

/**
 * Owns a set of modules and the queue that carries messages between them.
 *
 * After a message finalizes the host hands its outcome back to the sending
 * module: responses to `handleResponses`, fatal errors to `handleError`.
 * Fatal errors the sender does not handle go to `onFatalError` subscribers,
 * or to the log if there are none.
 */
export class ModuleHost implements ModuleRef, MessageSender {
  readonly moduleName = 'host';
  private queue: MessageQueue;
  private modules = new Map<string, BusModule>();
  private logger: QueueLogger;
  private sink: DiagnosticSink;
  private previousSink: DiagnosticSink;
  private closed = false;

  private statusHandlers: StatusHandler[] = [];
  private fatalErrorHandlers: FatalErrorHandler[] = [];

  constructor(options: ModuleHostOptions = {}) {
    const config = resolveHostConfig(options.env ?? process.env);
    this.logger = options.logger ?? console;
    this.sink =
      options.sink ?? (config.diagnostics === 'console' ? createConsoleSink(this.logger) : silentDiagnosticSink);
    this.previousSink = setDiagnosticSink(this.sink);

    this.queue = new MessageQueue({
      registry: options.registry ?? messageTypes,
      logger: this.logger,
      events: {
        onMessageQueued: (message) => this.emitStatus('message:sent', message.getType()),
        onMessageFinalized: (message) => this.handleFinalized(message),
        onWarning: (message, error) => this.handleWarning(message, error),
        onFatalError: (message, error) => this.handleFatalError(message, error),
      },
    });

    for (const module of options.modules ?? []) {
      this.addModule(module);
    }
  }

  /** @throws BusError DUPLICATE_MODULE if a module with the same name is already hosted */
  addModule(module: BusModule): void {
    if (this.modules.has(module.moduleName)) {
      throw new BusError('DUPLICATE_MODULE', `Module ${module.moduleName} is already loaded`, {
        moduleName: module.moduleName,
      });
    }
    this.modules.set(module.moduleName, module);
    this.queue.addRecipient(module);
    module.attach(this);
    this.emitStatus('module:added', module.moduleName);
  }

  removeModule(moduleName: string): boolean {
    const module = this.modules.get(moduleName);
    if (!module) return false;
    this.modules.delete(moduleName);
    this.queue.removeRecipient(moduleName);
    module.detach();
    this.emitStatus('module:removed', moduleName);
    return true;
  }

  getModule(moduleName: string): BusModule | undefined {
    return this.modules.get(moduleName);
  }

  getModuleNames(): string[] {
    return [...this.modules.keys()];
  }

  send(message: Message): void {
    this.queue.send(message);
  }

  /**
   * Run the start-up sequence. Each message is followed by a sync barrier, so
   * every module has finished with one before the next is delivered.
   */
  async start(): Promise<void> {
    for (const type of STARTUP_SEQUENCE) {
      const data: ConfigureData | undefined = type === 'configure1' ? { moduleNames: this.getModuleNames() } : undefined;
      this.send(new Message({ type, source: this, data, sink: this.sink }));
      this.send(new SyncMessage(this, this.sink));
    }
    await this.queue.drain();
    this.emitStatus('started');
  }

  /** Wait until every queued message has finalized. */
  drain(): Promise<void> {
    return this.queue.drain();
  }

  /** Tell modules to shut down, wait for them, then detach everything. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.send(new Message({ type: CLOSE_EVENT, source: this, sync: true, sink: this.sink }));
    this.closed = true;
    await this.queue.close();

    for (const module of this.modules.values()) {
      module.detach();
    }
    if (getDiagnosticSink() === this.sink) {
      setDiagnosticSink(this.previousSink);
    }
    this.emitStatus('closed');
  }

  onStatus(handler: StatusHandler): void {
    this.statusHandlers.push(handler);
  }

  onFatalError(handler: FatalErrorHandler): void {
    this.fatalErrorHandlers.push(handler);
  }

  private findSender(message: Message): BusModule | undefined {
    const module = this.modules.get(message.getSourceName());
    return module === message.getSource() ? module : undefined;
  }

  private handleFinalized(message: Message): void {
    const sender = this.findSender(message);
    if (sender && message.hasResponses()) {
      sender.handleResponses(message);
    }
    this.emitStatus('message:finalized', message.getType());
  }

  private handleWarning(message: Message, error: MessageError): void {
    this.logger.warn(`[ModuleHost] ${error.source} warning on '${message.getType()}': ${error.message}`);
    this.emitStatus('message:warning', `${error.source}: ${error.message}`);
  }

  private handleFatalError(message: Message, error: MessageError): void {
    const sender = this.findSender(message);
    if (sender?.handleError(message, error)) {
      this.emitStatus('message:error-handled', `${error.source}: ${error.message}`);
      return;
    }

    this.emitStatus('message:error', `${error.source}: ${error.message}`);
    if (this.fatalErrorHandlers.length === 0) {
      this.logger.error(
        `[ModuleHost] Unhandled error from ${error.source} on '${message.getType()}' sent by ${message.getSourceName()}:`,
        error.getException(),
      );
      return;
    }
    for (const handler of this.fatalErrorHandlers) handler(message, error);
  }

  private emitStatus(status: string, detail?: string): void {
    for (const handler of this.statusHandlers) handler(status, detail);
  }
}
