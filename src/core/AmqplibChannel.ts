// src/core/AmqplibChannel.ts
import type { Channel, ConsumeMessage, MessageProperties as AmqpMessageProperties, Options } from 'amqplib';
import { DEFAULT_EXCHANGE_SPEC, DEFAULT_QUEUE_SPEC } from '../interfaces/common';
import type { CloseParams, ExchangeSpec, MessageProperties, QueueSpec } from '../interfaces/common';
import type {
  BasicConsumeOptions,
  CancelCallback,
  DeliveryCallback,
  QueueDeclareReply,
  TransportChannel,
  TransportDelivery,
} from '../interfaces/transport';
import { AMQP_REPLY_SUCCESS } from '../interfaces/connection';

/**
 * Transport channel backed by an amqplib promise-API channel.
 *
 * amqplib acknowledges by message rather than by tag, so received messages
 * are kept until they are settled. Its public API always closes with reply
 * code 200; custom close parameters are only logged.
 */
export class AmqplibChannel implements TransportChannel {
  private readonly unsettled: Map<number, ConsumeMessage> = new Map();
  private readonly consumers: Set<string> = new Set();
  private detached = false;

  constructor(private readonly channel: Channel) {
    channel.on('error', (error: Error) => {
      console.error('[AmqplibChannel] Channel error:', error.message);
    });
  }

  public async close(params?: CloseParams): Promise<void> {
    if (params && params.code !== AMQP_REPLY_SUCCESS) {
      console.info(`[AmqplibChannel] Closing with ${params.code} "${params.reason}" (sent as ${AMQP_REPLY_SUCCESS})`);
    }
    await this.channel.close();
    this.unsettled.clear();
  }

  public async abort(params?: CloseParams): Promise<void> {
    this.detached = true;
    if (params) {
      console.info(`[AmqplibChannel] Aborting with ${params.code} "${params.reason}"`);
    }
    this.unsettled.clear();
    await this.channel.close();
  }

  public async queueDeclare(spec?: QueueSpec): Promise<QueueDeclareReply> {
    const options: Options.AssertQueue = spec
      ? {
          durable: spec.durable ?? DEFAULT_QUEUE_SPEC.durable,
          exclusive: spec.exclusive ?? DEFAULT_QUEUE_SPEC.exclusive,
          autoDelete: spec.autoDelete ?? DEFAULT_QUEUE_SPEC.autoDelete,
          arguments: spec.arguments,
        }
      : { durable: false, exclusive: true, autoDelete: true };
    const reply = await this.channel.assertQueue(spec?.name ?? '', options);
    return { queue: reply.queue, messageCount: reply.messageCount, consumerCount: reply.consumerCount };
  }

  public async exchangeDeclare(spec: ExchangeSpec): Promise<void> {
    await this.channel.assertExchange(spec.name, spec.type, {
      durable: spec.durable ?? DEFAULT_EXCHANGE_SPEC.durable,
      autoDelete: spec.autoDelete ?? DEFAULT_EXCHANGE_SPEC.autoDelete,
      arguments: spec.arguments,
    });
  }

  public async queueBind(queue: string, exchange: string, routingKey: string): Promise<void> {
    await this.channel.bindQueue(queue, exchange, routingKey);
  }

  public async basicPublish(
    exchange: string,
    routingKey: string,
    properties: MessageProperties,
    body: Buffer,
  ): Promise<void> {
    const sent = this.channel.publish(exchange, routingKey, body, toPublishOptions(properties));
    if (!sent) {
      throw new Error("Channel's internal buffer is full");
    }
  }

  public async queueDelete(queue: string): Promise<void> {
    await this.channel.deleteQueue(queue);
  }

  public async exchangeDelete(exchange: string): Promise<void> {
    await this.channel.deleteExchange(exchange);
  }

  public async queuePurge(queue: string): Promise<{ messageCount: number }> {
    const reply = await this.channel.purgeQueue(queue);
    return { messageCount: reply.messageCount };
  }

  public async basicConsume(
    queue: string,
    options: BasicConsumeOptions,
    onDelivery: DeliveryCallback,
    onCancel?: CancelCallback,
  ): Promise<string> {
    let consumerTag = options.consumerTag ?? '';
    const reply = await this.channel.consume(
      queue,
      (msg: ConsumeMessage | null) => {
        if (msg === null) {
          // Server-side cancel, e.g. the queue was deleted.
          this.consumers.delete(consumerTag);
          onCancel?.(consumerTag);
          return;
        }
        if (this.detached) {
          return;
        }
        if (!options.noAck) {
          this.unsettled.set(msg.fields.deliveryTag, msg);
        }
        onDelivery(toTransportDelivery(msg));
      },
      { noAck: options.noAck, consumerTag: options.consumerTag, exclusive: options.exclusive },
    );
    consumerTag = reply.consumerTag;
    this.consumers.add(consumerTag);
    return consumerTag;
  }

  public async basicCancel(consumerTag: string): Promise<void> {
    await this.channel.cancel(consumerTag);
    this.consumers.delete(consumerTag);
  }

  public async basicQos(prefetchCount: number, global: boolean): Promise<void> {
    await this.channel.prefetch(prefetchCount, global);
  }

  public async basicAck(deliveryTag: number, multiple: boolean): Promise<void> {
    this.channel.ack(this.take(deliveryTag, multiple), multiple);
  }

  public async basicNack(deliveryTag: number, multiple: boolean, requeue: boolean): Promise<void> {
    this.channel.nack(this.take(deliveryTag, multiple), multiple, requeue);
  }

  public onClose(listener: (error?: Error) => void): void {
    this.channel.once('close', (error?: Error) => listener(error));
  }

  /** Tags of consumers started on this channel and not cancelled */
  public get consumerTags(): string[] {
    return Array.from(this.consumers);
  }

  private take(deliveryTag: number, multiple: boolean): ConsumeMessage {
    const message = this.unsettled.get(deliveryTag);
    if (!message) {
      throw new Error(`Unknown delivery tag ${deliveryTag}`);
    }
    this.unsettled.delete(deliveryTag);
    if (multiple) {
      for (const tag of this.unsettled.keys()) {
        if (tag < deliveryTag) {
          this.unsettled.delete(tag);
        }
      }
    }
    return message;
  }
}

function toPublishOptions(properties: MessageProperties): Options.Publish {
  return { ...properties };
}

function toTransportDelivery(msg: ConsumeMessage): TransportDelivery {
  return {
    deliveryTag: msg.fields.deliveryTag,
    consumerTag: msg.fields.consumerTag,
    exchange: msg.fields.exchange,
    routingKey: msg.fields.routingKey,
    redelivered: msg.fields.redelivered,
    content: msg.content,
    properties: fromAmqpProperties(msg.properties),
  };
}

const STRING_PROPERTIES = [
  'contentType',
  'contentEncoding',
  'correlationId',
  'replyTo',
  'expiration',
  'messageId',
  'type',
  'userId',
  'appId',
] as const;

function fromAmqpProperties(source: AmqpMessageProperties): MessageProperties {
  const properties: MessageProperties = {};
  for (const key of STRING_PROPERTIES) {
    const value: unknown = source[key];
    if (typeof value === 'string') {
      properties[key] = value;
    }
  }
  const headers: unknown = source.headers;
  if (typeof headers === 'object' && headers !== null) {
    properties.headers = Object.fromEntries(Object.entries(headers));
  }
  const deliveryMode: unknown = source.deliveryMode;
  if (deliveryMode === 1 || deliveryMode === 2) {
    properties.deliveryMode = deliveryMode;
  }
  const priority: unknown = source.priority;
  if (typeof priority === 'number') {
    properties.priority = priority;
  }
  const timestamp: unknown = source.timestamp;
  if (typeof timestamp === 'number') {
    properties.timestamp = timestamp;
  }
  return properties;
}
