// src/interfaces/transport.ts
import type { CloseParams, ExchangeSpec, MessageProperties, QueueSpec } from './common';

export interface QueueDeclareReply {
  queue: string;
  messageCount: number;
  consumerCount: number;
}

/**
 * A message as handed over by the transport to a consumer callback.
 */
export interface TransportDelivery {
  deliveryTag: number;
  consumerTag: string;
  exchange: string;
  routingKey: string;
  redelivered: boolean;
  content: Buffer;
  properties: MessageProperties;
}

export interface BasicConsumeOptions {
  noAck: boolean;
  consumerTag?: string;
  exclusive?: boolean;
}

export type DeliveryCallback = (delivery: TransportDelivery) => void;

/**
 * Called when the broker cancels the consumer, e.g. because its queue was deleted.
 */
export type CancelCallback = (consumerTag: string) => void;

/**
 * The channel primitives the façade relies on. Implementations throw (or
 * reject) on failure; the façade turns those into typed errors.
 */
export interface TransportChannel {
  close(params?: CloseParams): Promise<void>;
  abort(params?: CloseParams): Promise<void>;
  /** Without a spec the broker names the queue */
  queueDeclare(spec?: QueueSpec): Promise<QueueDeclareReply>;
  exchangeDeclare(spec: ExchangeSpec): Promise<void>;
  queueBind(queue: string, exchange: string, routingKey: string): Promise<void>;
  basicPublish(exchange: string, routingKey: string, properties: MessageProperties, body: Buffer): Promise<void>;
  queueDelete(queue: string): Promise<void>;
  exchangeDelete(exchange: string): Promise<void>;
  queuePurge(queue: string): Promise<{ messageCount: number }>;
  basicConsume(
    queue: string,
    options: BasicConsumeOptions,
    onDelivery: DeliveryCallback,
    onCancel?: CancelCallback,
  ): Promise<string>;
  basicCancel(consumerTag: string): Promise<void>;
  basicQos(prefetchCount: number, global: boolean): Promise<void>;
  basicAck(deliveryTag: number, multiple: boolean): Promise<void>;
  basicNack(deliveryTag: number, multiple: boolean, requeue: boolean): Promise<void>;
  /** Registers a listener for the channel going away, for whatever reason */
  onClose(listener: (error?: Error) => void): void;
}

export interface Transport {
  createChannel(): Promise<TransportChannel>;
}
