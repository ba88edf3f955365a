// ./src/errors/DeliveryError.ts

import { RMQBaseError } from './BaseError';

export type DeliveryStateErrorKind = 'AlreadyAcknowledged' | 'UninitializedTag';

export class DeliveryStateError extends RMQBaseError {
  constructor(
    public readonly kind: DeliveryStateErrorKind,
    message: string,
  ) {
    super(message);
  }
}

export type DecodeTarget = 'text' | 'int' | 'float' | 'json' | 'xml';

export class RMQDecodeError extends RMQBaseError {
  public readonly kind = 'DecodeFailed' as const;

  constructor(
    public readonly target: DecodeTarget,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}
