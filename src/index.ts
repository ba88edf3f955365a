export { RMQChannel, openChannel } from './core/RMQChannel';
export type { DeliveryHandler, ChannelResult } from './core/RMQChannel';
export { RMQDelivery } from './core/RMQDelivery';
export type { DeliverySettler, SettledState, SettleError } from './core/RMQDelivery';
export { ContentDecoder } from './core/ContentDecoder';
export type { JsonValue, XmlValue } from './core/ContentDecoder';
export { AmqplibTransport, withHeartbeat } from './core/AmqplibTransport';
export { AmqplibChannel } from './core/AmqplibChannel';

export * from './errors';

export * from './interfaces/common';
export * from './interfaces/connection';
export type * from './interfaces/transport';

export { loadConnectionOptions } from './config/connection';
export { closeParamsFrom } from './utils/closeParams';
export { isReservedExchange, validateExchange, DEFAULT_EXCHANGE } from './utils/exchangeUtils';
export { ok, fail, unwrap } from './utils/result';
export type { Ok, Fail, Result } from './utils/result';
