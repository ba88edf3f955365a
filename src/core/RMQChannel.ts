// src/core/RMQChannel.ts
import { v4 as uuidv4 } from 'uuid';
import { DeliveryTracker } from './DeliveryTracker';
import { RMQDelivery } from './RMQDelivery';
import type {
  ChannelState,
  CloseParams,
  ConsumeOptions,
  ExchangeSpec,
  MessageProperties,
  QueueSpec,
} from '../interfaces/common';
import type { Transport, TransportChannel, TransportDelivery } from '../interfaces/transport';
import { ChannelOperationError, type ChannelErrorKind } from '../errors';
import { validateExchange } from '../utils/exchangeUtils';
import { fail, ok, type Fail, type Result } from '../utils/result';

export type DeliveryHandler = (delivery: RMQDelivery) => void | Promise<void>;

export type ChannelResult<T> = Promise<Result<T, ChannelOperationError>>;

/**
 * One AMQP session over a transport. Not safe for concurrent callers: open
 * one channel per caller when operations must overlap.
 */
export class RMQChannel {
  private currentState: ChannelState = 'open';
  private closing = false;
  private readonly deliveries: DeliveryTracker;

  private constructor(
    private readonly channel: TransportChannel,
    public readonly sessionId: string,
  ) {
    this.deliveries = new DeliveryTracker(channel, () => this.isOpen());
    channel.onClose((error) => this.handleTransportClose(error));
  }

  public static async open(transport: Transport): ChannelResult<RMQChannel> {
    try {
      const channel = await transport.createChannel();
      return ok(new RMQChannel(channel, uuidv4()));
    } catch (error) {
      const failure = ChannelOperationError.from('ChannelCreationFailed', 'Failed to create a channel', error);
      console.error(`[RMQChannel] ${failure.message}`);
      return fail(failure);
    }
  }

  public get state(): ChannelState {
    return this.currentState;
  }

  public isOpen(): boolean {
    return this.currentState === 'open';
  }

  /** Number of manual-ack deliveries not yet settled */
  public get unsettledCount(): number {
    return this.deliveries.size;
  }

  /**
   * Graceful close. With `params` the code and reason are handed to the
   * transport as given, without them the transport's default close is used.
   */
  public async close(params?: CloseParams): ChannelResult<void> {
    const wasOpen = this.isOpen();
    this.closing = true;
    try {
      await (params ? this.channel.close(params) : this.channel.close());
    } catch (error) {
      return this.failure('ChannelCloseFailed', `Failed to close channel ${this.sessionId}`, error);
    } finally {
      this.closing = false;
    }
    if (wasOpen) {
      console.info(`[RMQChannel] Channel ${this.sessionId} closed`);
    }
    this.markClosed();
    return ok(undefined);
  }

  /**
   * Forced close. Consumers stop receiving before the transport is told,
   * and the channel counts as closed whatever the outcome.
   */
  public async abort(params?: CloseParams): ChannelResult<void> {
    this.markClosed();
    try {
      await (params ? this.channel.abort(params) : this.channel.abort());
    } catch (error) {
      return this.failure('ChannelAbortFailed', `Failed to abort channel ${this.sessionId}`, error);
    }
    return ok(undefined);
  }

  /**
   * Declares a queue and returns the name the broker reports. Without a spec,
   * or with an empty name, the broker picks the name.
   */
  public declareQueue(spec?: QueueSpec): ChannelResult<string> {
    const label = spec?.name ? `queue "${spec.name}"` : 'a server-named queue';
    return this.invoke('QueueDeclarationFailed', `Failed to declare ${label}`, async (channel) => {
      const reply = await (spec ? channel.queueDeclare(spec) : channel.queueDeclare());
      return reply.queue;
    });
  }

  public declareExchange(spec: ExchangeSpec): ChannelResult<void> {
    return this.invoke('ExchangeDeclarationFailed', `Failed to declare exchange "${spec.name}"`, async (channel) => {
      if (validateExchange(spec.name)) {
        return;
      }
      await channel.exchangeDeclare(spec);
    });
  }

  public bindQueue(queueName: string, exchangeName: string, bindingKey: string): ChannelResult<void> {
    return this.invoke(
      'BindingFailed',
      `Failed to bind queue "${queueName}" to exchange "${exchangeName}"`,
      (channel) => channel.queueBind(queueName, exchangeName, bindingKey),
    );
  }

  /**
   * Publishes to an exchange; the default exchange `""` routes straight to the
   * queue named by `routingKey`. Text payloads are sent as UTF-8.
   */
  public publish(
    exchangeName: string,
    routingKey: string,
    payload: string | Uint8Array,
    properties: MessageProperties = {},
  ): ChannelResult<void> {
    const body = typeof payload === 'string' ? Buffer.from(payload, 'utf8') : Buffer.from(payload);
    return this.invoke(
      'PublishFailed',
      `Failed to publish to exchange "${exchangeName}" with routing key "${routingKey}"`,
      (channel) => channel.basicPublish(exchangeName, routingKey, properties, body),
    );
  }

  public deleteQueue(queueName: string): ChannelResult<void> {
    return this.invoke('QueueDeletionFailed', `Failed to delete queue "${queueName}"`, (channel) =>
      channel.queueDelete(queueName),
    );
  }

  public deleteExchange(exchangeName: string): ChannelResult<void> {
    return this.invoke('ExchangeDeletionFailed', `Failed to delete exchange "${exchangeName}"`, (channel) =>
      channel.exchangeDelete(exchangeName),
    );
  }

  /**
   * Removes all ready messages from the queue; resolves with how many were dropped.
   */
  public purgeQueue(queueName: string): ChannelResult<number> {
    return this.invoke('QueuePurgeFailed', `Failed to purge queue "${queueName}"`, async (channel) => {
      const reply = await channel.queuePurge(queueName);
      return reply.messageCount;
    });
  }

  public prefetch(count: number, global: boolean = false): ChannelResult<void> {
    return this.invoke('QosFailed', `Failed to set prefetch ${count}`, (channel) => channel.basicQos(count, global));
  }

  /**
   * Starts a consumer and resolves with its tag. Each message reaches
   * `onDelivery` as an `RMQDelivery`; in manual mode the handler owns the
   * acknowledgement.
   */
  public consume(queueName: string, onDelivery: DeliveryHandler, options: ConsumeOptions = {}): ChannelResult<string> {
    const ackMode = options.autoAck ? 'auto' : 'manual';
    return this.invoke('ConsumeFailed', `Failed to consume from queue "${queueName}"`, (channel) =>
      channel.basicConsume(
        queueName,
        { noAck: ackMode === 'auto', consumerTag: options.consumerTag, exclusive: options.exclusive },
        (message) => this.dispatch(message, ackMode, onDelivery),
        (consumerTag) => console.warn(`[RMQChannel] Consumer ${consumerTag} on "${queueName}" cancelled by broker`),
      ),
    );
  }

  public cancel(consumerTag: string): ChannelResult<void> {
    return this.invoke('ConsumerCancelFailed', `Failed to cancel consumer "${consumerTag}"`, (channel) =>
      channel.basicCancel(consumerTag),
    );
  }

  private dispatch(message: TransportDelivery, ackMode: 'auto' | 'manual', onDelivery: DeliveryHandler): void {
    if (!this.isOpen()) {
      return;
    }
    const delivery = new RMQDelivery(message, ackMode, this.deliveries);
    if (ackMode === 'manual') {
      this.deliveries.track(message.deliveryTag, delivery);
    }

    Promise.resolve()
      .then(() => onDelivery(delivery))
      .catch((error: unknown) => {
        console.error(
          `[RMQChannel] Delivery handler failed for "${message.routingKey}" (tag ${message.deliveryTag}):`,
          error,
        );
      });
  }

  private async invoke<T>(
    kind: ChannelErrorKind,
    message: string,
    operation: (channel: TransportChannel) => Promise<T>,
  ): ChannelResult<T> {
    if (!this.isOpen()) {
      return fail(new ChannelOperationError(kind, message, `channel ${this.sessionId} is closed`));
    }
    try {
      return ok(await operation(this.channel));
    } catch (error) {
      return this.failure(kind, message, error);
    }
  }

  private failure(kind: ChannelErrorKind, message: string, error: unknown): Fail<ChannelOperationError> {
    const failure = ChannelOperationError.from(kind, message, error);
    console.error(`[RMQChannel] ${failure.message}`);
    return fail(failure);
  }

  private handleTransportClose(error?: Error): void {
    if (!this.isOpen() || this.closing) {
      return;
    }
    console.warn(`[RMQChannel] Channel ${this.sessionId} closed by transport`, error?.message ?? '');
    this.markClosed();
  }

  private markClosed(): void {
    this.currentState = 'closed';
    this.deliveries.clear();
  }
}

export function openChannel(transport: Transport): ChannelResult<RMQChannel> {
  return RMQChannel.open(transport);
}
