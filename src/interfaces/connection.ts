// src/interfaces/connection.ts

/**
 * Connection options for the amqplib transport
 */
export interface ConnectionOptions {
  /** RabbitMQ connection URI */
  uri: string;
  /** Heartbeat interval in seconds. Default: 10 */
  heartbeat?: number;
  /** Connection attempt timeout in milliseconds. Default: 10000 */
  connectionTimeoutMs?: number;
}

/**
 * Connection event map for type-safe listeners
 */
export interface ConnectionEventMap {
  /** Emitted when the connection is closed, by us or by the broker */
  closed: [error?: Error];
  /** Emitted when the broker applies flow control */
  blocked: [reason: string];
  unblocked: [];
}

/** AMQP reply code sent on a normal close */
export const AMQP_REPLY_SUCCESS = 200;

/**
 * AMQP error codes classification
 * Based on AMQP 0-9-1 specification
 */
export const AMQP_RECOVERABLE_ERRORS = [
  311, // ContentTooLarge
  313, // NoConsumers
  320, // ConnectionForced (server maintenance)
  405, // ResourceLocked
  506, // ResourceError
] as const;

export const AMQP_NON_RECOVERABLE_ERRORS = [
  402, // InvalidPath
  403, // AccessRefused (auth failure)
  404, // NotFound
  406, // PreconditionFailed
  501, // FrameError
  502, // SyntaxError
  503, // CommandInvalid
  504, // ChannelError
  505, // UnexpectedFrame
  530, // NotAllowed
  540, // NotImplemented
  541, // InternalError
] as const;

/** Default heartbeat in seconds */
export const DEFAULT_HEARTBEAT = 10;

/** Default connect timeout in milliseconds */
export const DEFAULT_CONNECTION_TIMEOUT_MS = 10000;
