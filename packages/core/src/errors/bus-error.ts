export type BusErrorCode =
  | 'DUPLICATE_MESSAGE_TYPE'
  | 'UNKNOWN_MESSAGE_TYPE'
  | 'REF_COUNT_UNDERFLOW'
  | 'MESSAGE_FINALIZED'
  | 'QUEUE_CLOSED'
  | 'RECIPIENT_FAILED'
  | 'DUPLICATE_MODULE'
  | 'MODULE_DETACHED';

export class BusError extends Error {
  readonly code: BusErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: BusErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'BusError';
    this.code = code;
    this.context = context;
  }
}

export function isBusError(value: unknown, code?: BusErrorCode): value is BusError {
  return value instanceof BusError && (code === undefined || value.code === code);
}
