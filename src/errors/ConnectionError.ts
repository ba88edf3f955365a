// ./src/errors/ConnectionError.ts

import { RMQBaseError } from './BaseError';

export class RMQConnectionError extends RMQBaseError {
  constructor(message: string = 'Failed to establish a connection', options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class RMQTimeoutError extends RMQBaseError {
  constructor(message: string = 'Operation timed out') {
    super(message);
  }
}

export class RMQConfigError extends RMQBaseError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
  }
}
