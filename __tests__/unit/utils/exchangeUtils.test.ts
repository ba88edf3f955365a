import { describe, it, expect, beforeEach, vi, type MockInstance } from 'vitest';
import { DEFAULT_EXCHANGE, isReservedExchange, validateExchange } from '../../../src/utils/exchangeUtils';

describe('exchangeUtils', () => {
  describe('isReservedExchange', () => {
    it.each(['', 'amq.direct', 'amq.fanout', 'amq.topic', 'amq.headers', 'amq.match'])(
      'should treat "%s" as broker-owned',
      (name) => {
        expect(isReservedExchange(name)).toBe(true);
      },
    );

    it.each(['logs', 'events.topic', 'amq', 'amq.custom'])('should let "%s" be declared', (name) => {
      expect(isReservedExchange(name)).toBe(false);
    });
  });

  describe('validateExchange', () => {
    let warn: MockInstance<typeof console.warn>;

    beforeEach(() => {
      warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    });

    it('should skip the default exchange', () => {
      expect(validateExchange(DEFAULT_EXCHANGE)).toBe(true);
      expect(warn).toHaveBeenCalledWith('Using default exchange.');
    });

    it('should skip broker-owned exchanges', () => {
      expect(validateExchange('amq.fanout')).toBe(true);
      expect(warn).toHaveBeenCalledWith('Using reserved exchange "amq.fanout".');
    });

    it('should pass application exchanges through silently', () => {
      expect(validateExchange('orders')).toBe(false);
      expect(warn).not.toHaveBeenCalled();
    });
  });
});
