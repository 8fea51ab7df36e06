import {
  BusError,
  type Message,
  type MessageError,
  type MessageRecipient,
  type MessageTypeRegistry,
  messageTypes,
} from 'instrument-bus';

/** What a module needs from whoever hosts it. */
export interface MessageSender {
  send(message: Message): void;
}

export interface BusModuleOptions {
  /** Message levels this module wants (default: all) */
  levels?: number[];
  /** Message types this module introduces; registered on construction */
  messageTypes?: string[];
  registry?: MessageTypeRegistry;
}

/**
 * Base class for modules living on the bus.
 *
 * Subclasses override `processMessage` to react to messages, and optionally
 * `handleResponses` / `handleError` to look at the outcome of messages they sent.
 */
export class BusModule implements MessageRecipient {
  readonly moduleName: string;
  readonly levels?: readonly number[];
  private host: MessageSender | null = null;

  constructor(moduleName: string, options: BusModuleOptions = {}) {
    this.moduleName = moduleName;
    this.levels = options.levels;
    const registry = options.registry ?? messageTypes;
    for (const type of options.messageTypes ?? []) {
      registry.register(type);
    }
  }

  attach(host: MessageSender): void {
    this.host = host;
  }

  detach(): void {
    this.host = null;
  }

  isAttached(): boolean {
    return this.host !== null;
  }

  /** Default: ignore everything. */
  processMessage(_message: Message): void | Promise<void> {}

  /** Called after a message this module sent finalized with responses. */
  handleResponses(_message: Message): void {}

  /**
   * Called for each fatal error on a message this module sent.
   * @returns true if handled; false lets the host escalate it
   */
  handleError(_message: Message, _error: MessageError): boolean {
    return false;
  }

  /** @throws BusError MODULE_DETACHED when the module is not on a host */
  sendMessage(message: Message): void {
    if (!this.host) {
      throw new BusError('MODULE_DETACHED', `${this.moduleName} is not attached to a host`, {
        moduleName: this.moduleName,
        messageType: message.getType(),
      });
    }
    this.host.send(message);
  }
}
