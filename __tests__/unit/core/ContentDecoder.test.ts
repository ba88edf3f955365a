import { describe, it, expect } from 'vitest';
import { ContentDecoder } from '../../../src/core/ContentDecoder';
import type { RMQDecodeError } from '../../../src/errors';
import type { Result } from '../../../src/utils/result';

const decoderOf = (text: string) => new ContentDecoder(Buffer.from(text, 'utf8'));

function decodeError<T>(result: Result<T, RMQDecodeError>): RMQDecodeError {
  if (result.ok) {
    throw new Error(`Expected a decode failure, got ${String(result.value)}`);
  }
  return result.error;
}

describe('ContentDecoder', () => {
  describe('asText', () => {
    it('should decode UTF-8 text', () => {
      expect(decoderOf('Grüße, 世界 ✓').asText()).toEqual({ ok: true, value: 'Grüße, 世界 ✓' });
    });

    it('should keep a leading byte order mark', () => {
      const result = decoderOf('\uFEFFhello').asText();

      expect(result).toEqual({ ok: true, value: '\uFEFFhello' });
      expect(result.ok && result.value.length).toBe(6);
    });

    it('should decode an empty payload to an empty string', () => {
      expect(new ContentDecoder(Buffer.alloc(0)).asText()).toEqual({ ok: true, value: '' });
    });

    it('should fail on invalid UTF-8', () => {
      const error = decodeError(new ContentDecoder(Buffer.from([0xc3, 0x28])).asText());
      expect(error.kind).toBe('DecodeFailed');
      expect(error.target).toBe('text');
      expect(error.message.startsWith('Payload is not valid UTF-8: ')).toBe(true);
    });
  });

  describe('asInt', () => {
    it('should parse integers with surrounding whitespace', () => {
      expect(decoderOf(' 42\n').asInt()).toEqual({ ok: true, value: 42 });
      expect(decoderOf('-7').asInt()).toEqual({ ok: true, value: -7 });
      expect(decoderOf('+15').asInt()).toEqual({ ok: true, value: 15 });
    });

    it('should reject fractions and words', () => {
      expect(decodeError(decoderOf('4.2').asInt()).message).toBe('Payload is not an integer: "4.2"');
      expect(decodeError(decoderOf('forty').asInt()).target).toBe('int');
      expect(decodeError(decoderOf('').asInt()).message).toBe('Payload is not an integer: ""');
    });

    it('should reject integers beyond the safe range', () => {
      expect(decodeError(decoderOf('9007199254740993').asInt()).message).toBe(
        'Integer out of range: 9007199254740993',
      );
    });

    it('should pass text decoding failures through', () => {
      expect(decodeError(new ContentDecoder(Buffer.from([0xff])).asInt()).target).toBe('text');
    });
  });

  describe('asFloat', () => {
    it('should parse decimal and exponent literals', () => {
      expect(decoderOf('3.14').asFloat()).toEqual({ ok: true, value: 3.14 });
      expect(decoderOf('-2.5').asFloat()).toEqual({ ok: true, value: -2.5 });
      expect(decoderOf('.5').asFloat()).toEqual({ ok: true, value: 0.5 });
      expect(decoderOf('1e3').asFloat()).toEqual({ ok: true, value: 1000 });
      expect(decoderOf('7').asFloat()).toEqual({ ok: true, value: 7 });
    });

    it('should reject non-numerals', () => {
      expect(decodeError(decoderOf('abc').asFloat()).message).toBe('Payload is not a number: "abc"');
      expect(decodeError(decoderOf('NaN').asFloat()).target).toBe('float');
      expect(decodeError(decoderOf('0x1A').asFloat()).target).toBe('float');
    });

    it('should reject values that overflow', () => {
      expect(decodeError(decoderOf('1e400').asFloat()).message).toBe('Number out of range: 1e400');
    });
  });

  describe('asJSON', () => {
    it('should parse JSON documents and scalars', () => {
      expect(decoderOf('{"level":"info","tags":[1,true,null]}').asJSON()).toEqual({
        ok: true,
        value: { level: 'info', tags: [1, true, null] },
      });
      expect(decoderOf('"plain"').asJSON()).toEqual({ ok: true, value: 'plain' });
    });

    it('should fail on malformed JSON', () => {
      const error = decodeError(decoderOf('{level: info}').asJSON());
      expect(error.target).toBe('json');
      expect(error.message.startsWith('Payload is not valid JSON: ')).toBe(true);
    });
  });

  describe('asXML', () => {
    it('should parse elements into an object tree', () => {
      expect(decoderOf('<note><to>Ana</to><from>Bo</from></note>').asXML()).toEqual({
        ok: true,
        value: { note: { to: 'Ana', from: 'Bo' } },
      });
    });

    it('should keep attributes with a prefix and leave values as text', () => {
      expect(decoderOf('<item id="7">x</item>').asXML()).toEqual({
        ok: true,
        value: { item: { '#text': 'x', '@_id': '7' } },
      });
    });

    it('should fail on mismatched tags', () => {
      const error = decodeError(decoderOf('<a><b></a>').asXML());
      expect(error.target).toBe('xml');
      expect(error.message.startsWith('Payload is not valid XML: ')).toBe(true);
    });

    it('should fail on an empty payload', () => {
      expect(decodeError(decoderOf('').asXML()).target).toBe('xml');
    });
  });

  describe('asBytes', () => {
    it('should return identical bytes after any number of decodes', () => {
      const payload = Buffer.from('{"id":1}', 'utf8');
      const decoder = new ContentDecoder(payload);

      decoder.asText();
      decoder.asJSON();
      decoder.asText();
      decoder.asXML();

      expect(decoder.asBytes().equals(payload)).toBe(true);
      expect(decoder.byteLength).toBe(8);
    });

    it('should not expose the stored bytes to mutation', () => {
      const payload = Buffer.from('abc', 'utf8');
      const decoder = new ContentDecoder(payload);

      payload[0] = 0x7a;
      const copy = decoder.asBytes();
      copy[1] = 0x7a;

      expect(decoder.asText()).toEqual({ ok: true, value: 'abc' });
    });
  });
});
