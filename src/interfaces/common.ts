// ./src/interfaces/common.ts

export type ExchangeType = 'direct' | 'fanout' | 'topic' | 'headers';

export type AckMode = 'auto' | 'manual';

export type ArgumentTable = Readonly<Record<string, unknown>>;

export interface QueueSpec {
  readonly name: string;
  /** Survives a broker restart. Default: false */
  readonly durable?: boolean;
  /** Restricted to the declaring connection. Default: false */
  readonly exclusive?: boolean;
  /** Deleted by the broker once the last consumer goes away. Default: true */
  readonly autoDelete?: boolean;
  readonly arguments?: ArgumentTable;
}

export interface ExchangeSpec {
  readonly name: string;
  readonly type: ExchangeType;
  /** Default: false */
  readonly durable?: boolean;
  /** Default: false */
  readonly autoDelete?: boolean;
  readonly arguments?: ArgumentTable;
}

export const DEFAULT_QUEUE_SPEC: Required<Omit<QueueSpec, 'name' | 'arguments'>> = {
  durable: false,
  exclusive: false,
  autoDelete: true,
};

export const DEFAULT_EXCHANGE_SPEC: Required<Omit<ExchangeSpec, 'name' | 'type' | 'arguments'>> = {
  durable: false,
  autoDelete: false,
};

export interface CloseParams {
  /** AMQP reply code, e.g. 200 for a normal shutdown */
  readonly code: number;
  readonly reason: string;
}

/**
 * AMQP basic properties carried with a message.
 */
export interface MessageProperties {
  contentType?: string;
  contentEncoding?: string;
  headers?: Record<string, unknown>;
  /** 1 = transient, 2 = persistent */
  deliveryMode?: 1 | 2;
  priority?: number;
  correlationId?: string;
  replyTo?: string;
  expiration?: string;
  messageId?: string;
  timestamp?: number;
  type?: string;
  userId?: string;
  appId?: string;
}

export interface ConsumeOptions {
  /** Broker considers messages acknowledged on delivery. Default: false */
  autoAck?: boolean;
  consumerTag?: string;
  exclusive?: boolean;
}

export type ChannelState = 'open' | 'closed';

export type DeliveryState = 'unacknowledged' | 'acknowledged' | 'rejected';
