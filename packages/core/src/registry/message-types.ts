import { BusError } from '../errors/bus-error.js';

/** Message types every host understands before any module registers its own. */
export const BUILTIN_MESSAGE_TYPES: readonly string[] = [
  // Core/general messages
  'add to ui',
  'close event',
  'configure1',
  'configure2',
  'current parameters',
  'module',
  'new directory',
  'new parameters file',
  'new shutters file',
  'start',
  'sync',
];

/**
 * Set of recognised message type names.
 *
 * Only a guard against typos in type strings: names are added, never removed,
 * and carry no schema.
 */
export class MessageTypeRegistry {
  private types: Set<string>;

  constructor(initial: Iterable<string> = BUILTIN_MESSAGE_TYPES) {
    this.types = new Set(initial);
  }

  /**
   * Add a message type.
   * @throws BusError DUPLICATE_MESSAGE_TYPE when `failIfExists` and the name is known
   */
  register(name: string, failIfExists = true): void {
    if (failIfExists && this.types.has(name)) {
      throw new BusError('DUPLICATE_MESSAGE_TYPE', `Message ${name} already exists!`, { name });
    }
    this.types.add(name);
  }

  has(name: string): boolean {
    return this.types.has(name);
  }

  /** @throws BusError UNKNOWN_MESSAGE_TYPE */
  assertValid(name: string): void {
    if (!this.types.has(name)) {
      throw new BusError('UNKNOWN_MESSAGE_TYPE', `Unknown message type: ${name}`, { name });
    }
  }

  /** Registered names in registration order. */
  names(): string[] {
    return [...this.types];
  }

  get size(): number {
    return this.types.size;
  }
}

/** Process-wide registry. Modules should register their types at initialization. */
export const messageTypes = new MessageTypeRegistry();

export function addMessage(name: string, failIfExists = true): void {
  messageTypes.register(name, failIfExists);
}

export function isValidMessageType(name: string): boolean {
  return messageTypes.has(name);
}

export function assertValidMessageType(name: string): void {
  messageTypes.assertValid(name);
}
