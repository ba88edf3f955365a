// src/config/connection.ts
import { z } from 'zod';
import {
  ConnectionOptions,
  DEFAULT_CONNECTION_TIMEOUT_MS,
  DEFAULT_HEARTBEAT,
} from '../interfaces/connection';
import { RMQConfigError } from '../errors';

const ConnectionEnvSchema = z.object({
  RMQ_URI: z
    .string({ required_error: 'RMQ_URI is required' })
    .regex(/^amqps?:\/\//, 'RMQ_URI must start with amqp:// or amqps://'),
  RMQ_HEARTBEAT: z.coerce.number().int().nonnegative().default(DEFAULT_HEARTBEAT),
  RMQ_CONNECTION_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_CONNECTION_TIMEOUT_MS),
});

/**
 * Reads connection options from environment variables.
 *
 * - `RMQ_URI` (required)
 * - `RMQ_HEARTBEAT` seconds, default 10
 * - `RMQ_CONNECTION_TIMEOUT_MS`, default 10000
 *
 * @throws {RMQConfigError} listing every invalid variable
 */
export function loadConnectionOptions(env: NodeJS.ProcessEnv = process.env): Required<ConnectionOptions> {
  const parsed = ConnectionEnvSchema.safeParse({
    RMQ_URI: env.RMQ_URI,
    RMQ_HEARTBEAT: blankToUndefined(env.RMQ_HEARTBEAT),
    RMQ_CONNECTION_TIMEOUT_MS: blankToUndefined(env.RMQ_CONNECTION_TIMEOUT_MS),
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new RMQConfigError(`Invalid connection configuration: ${issues.join('; ')}`, issues);
  }

  return {
    uri: parsed.data.RMQ_URI,
    heartbeat: parsed.data.RMQ_HEARTBEAT,
    connectionTimeoutMs: parsed.data.RMQ_CONNECTION_TIMEOUT_MS,
  };
}

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}
