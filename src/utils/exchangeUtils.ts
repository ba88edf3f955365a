// src/utils/exchangeUtils.ts

const RESERVED_EXCHANGES = ['', 'amq.direct', 'amq.fanout', 'amq.topic', 'amq.headers', 'amq.match'];

export const DEFAULT_EXCHANGE = '';

export function isReservedExchange(exchange: string): boolean {
  return RESERVED_EXCHANGES.includes(exchange);
}

/**
 * Warns when the name points at the default or a broker-owned exchange.
 * Returns true when the exchange must not be declared.
 */
export function validateExchange(exchange: string): boolean {
  if (exchange === DEFAULT_EXCHANGE) {
    console.warn('Using default exchange.');
    return true;
  }
  if (isReservedExchange(exchange)) {
    console.warn(`Using reserved exchange "${exchange}".`);
    return true;
  }
  return false;
}
