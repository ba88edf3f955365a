// ./src/errors/ChannelError.ts

import { RMQBaseError } from './BaseError';
import { AMQP_NON_RECOVERABLE_ERRORS, AMQP_RECOVERABLE_ERRORS } from '../interfaces/connection';

const RECOVERABLE_CODES: ReadonlySet<number> = new Set<number>(AMQP_RECOVERABLE_ERRORS);
const NON_RECOVERABLE_CODES: ReadonlySet<number> = new Set<number>(AMQP_NON_RECOVERABLE_ERRORS);

export type ChannelErrorKind =
  | 'ChannelCreationFailed'
  | 'ChannelCloseFailed'
  | 'ChannelAbortFailed'
  | 'QueueDeclarationFailed'
  | 'ExchangeDeclarationFailed'
  | 'BindingFailed'
  | 'PublishFailed'
  | 'QueueDeletionFailed'
  | 'ExchangeDeletionFailed'
  | 'QueuePurgeFailed'
  | 'ConsumeFailed'
  | 'ConsumerCancelFailed'
  | 'QosFailed'
  | 'AcknowledgementFailed';

/**
 * A transport failure surfaced by the channel façade.
 *
 * `detail` keeps the diagnostic text of the underlying error and `cause` the
 * error itself. `replyCode` is set when the client reported an AMQP reply code.
 */
export class ChannelOperationError extends RMQBaseError {
  public readonly replyCode?: number;

  constructor(
    public readonly kind: ChannelErrorKind,
    message: string,
    public readonly detail: string = '',
    options?: { cause?: unknown; replyCode?: number },
  ) {
    super(detail ? `${message}: ${detail}` : message, { cause: options?.cause });
    this.replyCode = options?.replyCode;
  }

  public static from(kind: ChannelErrorKind, message: string, error: unknown): ChannelOperationError {
    return new ChannelOperationError(kind, message, describeError(error), {
      cause: error,
      replyCode: replyCodeOf(error),
    });
  }

  /**
   * Whether the broker reply code names a condition that may clear by itself.
   * Failures without a reply code (socket errors, timeouts) count as recoverable.
   */
  public get recoverable(): boolean {
    if (this.replyCode === undefined) {
      return true;
    }
    if (NON_RECOVERABLE_CODES.has(this.replyCode)) {
      return false;
    }
    return RECOVERABLE_CODES.has(this.replyCode);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : String(error);
}

/**
 * amqplib puts the reply code on `code` for channel and connection closes.
 */
export function replyCodeOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  const code = 'code' in error ? error.code : 'replyCode' in error ? error.replyCode : undefined;
  return typeof code === 'number' && Number.isInteger(code) ? code : undefined;
}
