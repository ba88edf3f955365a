// src/core/RMQDelivery.ts
import { ContentDecoder, type JsonValue, type XmlValue } from './ContentDecoder';
import type { AckMode, DeliveryState, MessageProperties } from '../interfaces/common';
import type { TransportDelivery } from '../interfaces/transport';
import { ChannelOperationError, DeliveryStateError, RMQDecodeError } from '../errors';
import { fail, ok, type Result } from '../utils/result';

export type SettledState = Exclude<DeliveryState, 'unacknowledged'>;

/**
 * Issues acknowledgements on behalf of a delivery. Implemented per channel so
 * that `multiple` settles every earlier delivery of that channel.
 */
export interface DeliverySettler {
  settle(
    deliveryTag: number,
    outcome: SettledState,
    multiple: boolean,
    requeue: boolean,
  ): Promise<Result<void, ChannelOperationError>>;
}

export type SettleError = DeliveryStateError | ChannelOperationError;

export class RMQDelivery {
  private currentState: DeliveryState = 'unacknowledged';
  private readonly decoder: ContentDecoder;

  constructor(
    private readonly message: TransportDelivery,
    public readonly ackMode: AckMode,
    private readonly settler: DeliverySettler,
  ) {
    this.decoder = new ContentDecoder(message.content);
  }

  public get state(): DeliveryState {
    return this.currentState;
  }

  public get properties(): Readonly<MessageProperties> {
    return this.message.properties;
  }

  public get exchange(): string {
    return this.message.exchange;
  }

  public get routingKey(): string {
    return this.message.routingKey;
  }

  public get consumerTag(): string {
    return this.message.consumerTag;
  }

  public get redelivered(): boolean {
    return this.message.redelivered;
  }

  public getDeliveryTag(): Result<number, DeliveryStateError> {
    const tag = this.message.deliveryTag;
    if (!Number.isInteger(tag) || tag <= 0) {
      return fail(new DeliveryStateError('UninitializedTag', 'Delivery tag has not been assigned'));
    }
    return ok(tag);
  }

  public ack(multiple: boolean = false): Promise<Result<void, SettleError>> {
    return this.transition('acknowledged', multiple, false);
  }

  public nack(multiple: boolean = false, requeue: boolean = true): Promise<Result<void, SettleError>> {
    return this.transition('rejected', multiple, requeue);
  }

  /**
   * Moves an unsettled delivery to its terminal state after a `multiple`
   * acknowledgement issued through a later delivery.
   * @internal
   */
  public markSettled(outcome: SettledState): void {
    if (this.currentState === 'unacknowledged') {
      this.currentState = outcome;
    }
  }

  private async transition(
    outcome: SettledState,
    multiple: boolean,
    requeue: boolean,
  ): Promise<Result<void, SettleError>> {
    const tag = this.getDeliveryTag();
    if (!tag.ok) {
      return tag;
    }
    if (this.currentState !== 'unacknowledged') {
      return fail(
        new DeliveryStateError('AlreadyAcknowledged', `Delivery ${tag.value} is already ${this.currentState}`),
      );
    }

    // Claimed up front so a concurrent second call sees a settled delivery.
    this.currentState = outcome;
    if (this.ackMode === 'auto') {
      return ok(undefined);
    }

    const settled = await this.settler.settle(tag.value, outcome, multiple, requeue);
    if (!settled.ok) {
      this.currentState = 'unacknowledged';
    }
    return settled;
  }

  public asBytes(): Buffer {
    return this.decoder.asBytes();
  }

  public asText(): Result<string, RMQDecodeError> {
    return this.decoder.asText();
  }

  public asInt(): Result<number, RMQDecodeError> {
    return this.decoder.asInt();
  }

  public asFloat(): Result<number, RMQDecodeError> {
    return this.decoder.asFloat();
  }

  public asJSON(): Result<JsonValue, RMQDecodeError> {
    return this.decoder.asJSON();
  }

  public asXML(): Result<XmlValue, RMQDecodeError> {
    return this.decoder.asXML();
  }
}
