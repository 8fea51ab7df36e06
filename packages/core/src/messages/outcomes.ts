/**
 * What recipients attach to a message.
 *
 * A MessageError with an exception is fatal to the sending module: it must
 * raise it if it cannot handle it. Without one it is only a warning.
 */

export interface MessageErrorInit {
  /** Name of the module that produced the error */
  source: string;
  message: string;
  exception?: Error;
}

export class MessageError {
  readonly source: string;
  readonly message: string;
  readonly exception: Error | undefined;

  constructor(init: MessageErrorInit) {
    this.source = init.source;
    this.message = init.message;
    this.exception = init.exception;
    Object.freeze(this);
  }

  getException(): Error | undefined {
    return this.exception;
  }

  hasException(): boolean {
    return this.exception !== undefined;
  }
}

export interface MessageResponseInit<T = unknown> {
  /** Name of the module that answered */
  source: string;
  data: T;
}

export class MessageResponse<T = unknown> {
  readonly source: string;
  readonly data: T;

  constructor(init: MessageResponseInit<T>) {
    this.source = init.source;
    this.data = init.data;
    Object.freeze(this);
  }

  getData(): T {
    return this.data;
  }
}
