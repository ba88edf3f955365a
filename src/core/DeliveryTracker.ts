// src/core/DeliveryTracker.ts
import type { DeliverySettler, RMQDelivery, SettledState } from './RMQDelivery';
import type { TransportChannel } from '../interfaces/transport';
import { ChannelOperationError } from '../errors';
import { fail, ok, type Result } from '../utils/result';

/**
 * Unsettled manual-ack deliveries of one channel, keyed by delivery tag.
 */
export class DeliveryTracker implements DeliverySettler {
  private readonly pending: Map<number, RMQDelivery> = new Map();

  constructor(
    private readonly channel: TransportChannel,
    private readonly isOpen: () => boolean,
  ) {}

  public get size(): number {
    return this.pending.size;
  }

  public track(deliveryTag: number, delivery: RMQDelivery): void {
    this.pending.set(deliveryTag, delivery);
  }

  public async settle(
    deliveryTag: number,
    outcome: SettledState,
    multiple: boolean,
    requeue: boolean,
  ): Promise<Result<void, ChannelOperationError>> {
    const action = outcome === 'acknowledged' ? 'acknowledge' : 'reject';
    if (!this.isOpen()) {
      return fail(
        new ChannelOperationError('AcknowledgementFailed', `Failed to ${action} delivery ${deliveryTag}`, 'channel is closed'),
      );
    }

    try {
      if (outcome === 'acknowledged') {
        await this.channel.basicAck(deliveryTag, multiple);
      } else {
        await this.channel.basicNack(deliveryTag, multiple, requeue);
      }
    } catch (error) {
      const failure = ChannelOperationError.from('AcknowledgementFailed', `Failed to ${action} delivery ${deliveryTag}`, error);
      console.error(`[RMQChannel] ${failure.message}`);
      return fail(failure);
    }

    this.release(deliveryTag, outcome, multiple);
    return ok(undefined);
  }

  /**
   * Drops every tracked delivery; their tags are meaningless once the channel is gone.
   */
  public clear(): void {
    this.pending.clear();
  }

  private release(deliveryTag: number, outcome: SettledState, multiple: boolean): void {
    this.pending.delete(deliveryTag);
    if (!multiple) {
      return;
    }
    for (const [tag, delivery] of this.pending) {
      if (tag < deliveryTag) {
        delivery.markSettled(outcome);
        this.pending.delete(tag);
      }
    }
  }
}
