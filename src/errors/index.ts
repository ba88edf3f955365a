import type { ChannelErrorKind } from './ChannelError';
import type { DeliveryStateErrorKind } from './DeliveryError';

export { RMQBaseError } from './BaseError';
export { RMQConnectionError, RMQTimeoutError, RMQConfigError } from './ConnectionError';
export { ChannelOperationError, describeError, replyCodeOf } from './ChannelError';
export type { ChannelErrorKind } from './ChannelError';
export { DeliveryStateError, RMQDecodeError } from './DeliveryError';
export type { DeliveryStateErrorKind, DecodeTarget } from './DeliveryError';

export type ErrorKind = ChannelErrorKind | DeliveryStateErrorKind | 'DecodeFailed';
