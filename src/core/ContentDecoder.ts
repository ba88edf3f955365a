// src/core/ContentDecoder.ts
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { RMQDecodeError, describeError } from '../errors';
import { fail, ok, type Result } from '../utils/result';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type XmlValue = Record<string, unknown>;

const INT_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  ignoreDeclaration: true,
  parseTagValue: false,
  parseAttributeValue: false,
});

/**
 * Read-only views over a message payload. Every accessor decodes from the
 * stored bytes on each call.
 */
export class ContentDecoder {
  private readonly payload: Buffer;

  constructor(payload: Uint8Array) {
    this.payload = Buffer.from(payload);
  }

  public get byteLength(): number {
    return this.payload.byteLength;
  }

  public asBytes(): Buffer {
    return Buffer.from(this.payload);
  }

  public asText(): Result<string, RMQDecodeError> {
    try {
      return ok(new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(this.payload));
    } catch (error) {
      return fail(new RMQDecodeError('text', `Payload is not valid UTF-8: ${describeError(error)}`, { cause: error }));
    }
  }

  public asInt(): Result<number, RMQDecodeError> {
    const text = this.asText();
    if (!text.ok) {
      return text;
    }
    const literal = text.value.trim();
    if (!INT_PATTERN.test(literal)) {
      return fail(new RMQDecodeError('int', `Payload is not an integer: "${preview(literal)}"`));
    }
    const value = Number(literal);
    if (!Number.isSafeInteger(value)) {
      return fail(new RMQDecodeError('int', `Integer out of range: ${preview(literal)}`));
    }
    return ok(value);
  }

  public asFloat(): Result<number, RMQDecodeError> {
    const text = this.asText();
    if (!text.ok) {
      return text;
    }
    const literal = text.value.trim();
    if (!FLOAT_PATTERN.test(literal)) {
      return fail(new RMQDecodeError('float', `Payload is not a number: "${preview(literal)}"`));
    }
    const value = Number(literal);
    if (!Number.isFinite(value)) {
      return fail(new RMQDecodeError('float', `Number out of range: ${preview(literal)}`));
    }
    return ok(value);
  }

  public asJSON(): Result<JsonValue, RMQDecodeError> {
    const text = this.asText();
    if (!text.ok) {
      return text;
    }
    try {
      const value: JsonValue = JSON.parse(text.value);
      return ok(value);
    } catch (error) {
      return fail(new RMQDecodeError('json', `Payload is not valid JSON: ${describeError(error)}`, { cause: error }));
    }
  }

  public asXML(): Result<XmlValue, RMQDecodeError> {
    const text = this.asText();
    if (!text.ok) {
      return text;
    }
    const validation = XMLValidator.validate(text.value);
    if (validation !== true) {
      const { msg, line, col } = validation.err;
      return fail(new RMQDecodeError('xml', `Payload is not valid XML: ${msg} (line ${line}, column ${col})`));
    }
    try {
      const value: XmlValue = xmlParser.parse(text.value);
      return ok(value);
    } catch (error) {
      return fail(new RMQDecodeError('xml', `Payload is not valid XML: ${describeError(error)}`, { cause: error }));
    }
  }
}

function preview(text: string): string {
  return text.length > 32 ? `${text.slice(0, 32)}...` : text;
}
