// src/core/AmqplibTransport.ts
import * as amqp from 'amqplib';
import { EventEmitter } from 'events';
import { AmqplibChannel } from './AmqplibChannel';
import type { Transport, TransportChannel } from '../interfaces/transport';
import {
  ConnectionEventMap,
  ConnectionOptions,
  DEFAULT_CONNECTION_TIMEOUT_MS,
  DEFAULT_HEARTBEAT,
} from '../interfaces/connection';
import { RMQConnectionError, RMQTimeoutError, describeError } from '../errors';

export type AmqpConnection = Awaited<ReturnType<typeof amqp.connect>>;

/**
 * Physical broker connection. Channels opened here become invalid once the
 * connection closes; reconnecting is up to the caller.
 */
export class AmqplibTransport extends EventEmitter<ConnectionEventMap> implements Transport {
  private closed = false;

  private constructor(private readonly connection: AmqpConnection) {
    super();
    this.setupConnectionListeners();
  }

  public static async connect(options: ConnectionOptions): Promise<AmqplibTransport> {
    const connection = await connectWithTimeout(options);
    return new AmqplibTransport(connection);
  }

  public isClosed(): boolean {
    return this.closed;
  }

  public async createChannel(): Promise<TransportChannel> {
    if (this.closed) {
      throw new RMQConnectionError('Connection is closed');
    }
    const channel = await this.connection.createChannel();
    return new AmqplibChannel(channel);
  }

  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.connection.close();
  }

  private setupConnectionListeners(): void {
    this.connection.on('error', (error: Error) => {
      console.error('[AmqplibTransport] Connection error:', error.message);
      // Error event is followed by close event
    });

    this.connection.on('close', (error?: Error) => {
      if (!this.closed) {
        console.warn('[AmqplibTransport] Connection closed', error?.message ?? '');
      }
      this.closed = true;
      this.emit('closed', error);
    });

    this.connection.on('blocked', (reason: string) => {
      console.warn('[AmqplibTransport] Connection blocked:', reason);
      this.emit('blocked', reason);
    });

    this.connection.on('unblocked', () => {
      console.info('[AmqplibTransport] Connection unblocked');
      this.emit('unblocked');
    });
  }
}

async function connectWithTimeout(options: ConnectionOptions): Promise<AmqpConnection> {
  const timeoutMs = options.connectionTimeoutMs ?? DEFAULT_CONNECTION_TIMEOUT_MS;
  const url = withHeartbeat(options.uri, options.heartbeat ?? DEFAULT_HEARTBEAT);
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const timeout = setTimeout(() => {
      timedOut = true;
      reject(new RMQTimeoutError(`Connection timeout after ${timeoutMs}ms`));
    }, timeoutMs);

    amqp
      .connect(url)
      .then((connection) => {
        clearTimeout(timeout);
        if (timedOut) {
          console.warn('[AmqplibTransport] Connection established after timeout, closing to prevent leak');
          connection.close().catch((error: unknown) => {
            console.error('[AmqplibTransport] Failed to close late connection:', describeError(error));
          });
          return;
        }
        resolve(connection);
      })
      .catch((error: unknown) => {
        clearTimeout(timeout);
        if (!timedOut) {
          reject(new RMQConnectionError(`Failed to connect: ${describeError(error)}`, { cause: error }));
        }
      });
  });
}

/**
 * amqplib reads the heartbeat from the URL query; an explicit one in the URI wins.
 */
export function withHeartbeat(uri: string, heartbeat: number): string {
  let url: URL;
  try {
    url = new URL(uri);
  } catch (error) {
    throw new RMQConnectionError(`Invalid connection URI: ${describeError(error)}`, { cause: error });
  }
  if (!url.searchParams.has('heartbeat')) {
    url.searchParams.set('heartbeat', String(heartbeat));
  }
  return url.toString();
}
