/**
 * Relay wire protocol tests
 */

import {
  LineDecoder,
  MAX_CALLBACK_BODY_BYTES,
  MAX_DELIVERY_LINE_BYTES,
  decodeMessage,
  encodeMessage,
  messageToResult,
  outcomeToMessage,
} from '../../../src/relay/protocol.js';
import { ProtocolError } from '../../../src/types/errors.js';

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('protocol', () => {
  describe('encodeMessage', () => {
    it('should write one JSON object per line', () => {
      expect(encodeMessage({ type: 'register', state: 's1', timeoutMs: 1000 })).toBe(
        '{"type":"register","state":"s1","timeoutMs":1000}\n'
      );
    });
  });

  describe('decodeMessage', () => {
    it('should parse a register message', () => {
      expect(decodeMessage('{"type":"register","state":null}')).toEqual({
        type: 'register',
        state: null,
      });
    });

    it('should parse a deliver message', () => {
      expect(decodeMessage('{"type":"deliver","success":true,"code":"ABC","raw":null}')).toEqual({
        type: 'deliver',
        success: true,
        code: 'ABC',
        raw: null,
      });
    });

    it('should reject invalid JSON', () => {
      const error = catchError(() => decodeMessage('{not json'));

      expect(error).toBeInstanceOf(ProtocolError);
      expect(error).toMatchObject({ code: 'INVALID_JSON' });
    });

    it('should reject unknown message types', () => {
      const error = catchError(() => decodeMessage('{"type":"hello"}'));

      expect(error).toBeInstanceOf(ProtocolError);
      expect(error).toMatchObject({ code: 'INVALID_MESSAGE' });
    });

    it('should reject a non-positive timeout', () => {
      expect(() => decodeMessage('{"type":"register","timeoutMs":0}')).toThrow(
        'Relay message does not match the protocol'
      );
    });
  });

  describe('outcomeToMessage', () => {
    it('should carry the code of a successful delivery', () => {
      expect(
        outcomeToMessage({ kind: 'delivered', result: { success: true, code: 'ABC' } })
      ).toEqual({ type: 'deliver', success: true, code: 'ABC', raw: null });
    });

    it('should carry the raw payload when no code was found', () => {
      expect(
        outcomeToMessage({
          kind: 'delivered',
          result: { success: false, raw: { error: 'access_denied' } },
        })
      ).toEqual({ type: 'deliver', success: false, code: null, raw: { error: 'access_denied' } });
    });

    it('should report supersede, timeout and shutdown as reasons', () => {
      expect(outcomeToMessage({ kind: 'superseded' })).toEqual({
        type: 'deliver',
        success: false,
        reason: 'superseded',
      });
      expect(outcomeToMessage({ kind: 'timed_out' })).toEqual({
        type: 'deliver',
        success: false,
        reason: 'timeout',
      });
      expect(outcomeToMessage({ kind: 'cancelled', reason: 'shutdown' })).toEqual({
        type: 'deliver',
        success: false,
        reason: 'shutdown',
      });
    });

    it('should send nothing for cancellations the consumer caused', () => {
      expect(outcomeToMessage({ kind: 'cancelled', reason: 'unregistered' })).toBeNull();
      expect(outcomeToMessage({ kind: 'cancelled', reason: 'connection_lost' })).toBeNull();
    });
  });

  describe('messageToResult', () => {
    it('should map a delivery with code to a successful result', () => {
      expect(messageToResult({ type: 'deliver', success: true, code: 'ABC', raw: null })).toEqual({
        success: true,
        code: 'ABC',
      });
    });

    it('should map a delivery without code to the raw payload', () => {
      expect(
        messageToResult({ type: 'deliver', success: false, code: null, raw: { error: 'denied' } })
      ).toEqual({ success: false, raw: { error: 'denied' } });
      expect(messageToResult({ type: 'deliver', success: false })).toEqual({ success: false, raw: {} });
    });

    it('should return null for failure notices', () => {
      expect(messageToResult({ type: 'deliver', success: false, reason: 'timeout' })).toBeNull();
    });
  });

  describe('LineDecoder', () => {
    it('should split complete lines and keep the remainder', () => {
      const decoder = new LineDecoder();

      expect(decoder.push('{"a":1}\n{"b"')).toEqual(['{"a":1}']);
      expect(decoder.pending).toBe(4);
      expect(decoder.push(':2}\n')).toEqual(['{"b":2}']);
      expect(decoder.pending).toBe(0);
    });

    it('should skip blank lines', () => {
      const decoder = new LineDecoder();

      expect(decoder.push('\n  \r\n{"a":1}\r\n')).toEqual(['{"a":1}']);
    });

    it('should reassemble multi-byte characters split across chunks', () => {
      const decoder = new LineDecoder();
      const bytes = Buffer.from('{"s":"é"}\n', 'utf8');
      const splitAt = bytes.indexOf(0xc3) + 1;

      expect(decoder.push(bytes.subarray(0, splitAt))).toEqual([]);
      expect(decoder.push(bytes.subarray(splitAt))).toEqual(['{"s":"é"}']);
    });

    it('should fit a delivery of the largest callback body after JSON escaping', () => {
      const raw = { error_description: '\u0001'.repeat(MAX_CALLBACK_BODY_BYTES) };
      const line = encodeMessage({ type: 'deliver', success: false, code: null, raw });

      expect(Buffer.byteLength(line)).toBeLessThan(MAX_DELIVERY_LINE_BYTES);
      expect(new LineDecoder(MAX_DELIVERY_LINE_BYTES).push(line)).toHaveLength(1);
    });

    it('should reject lines over the size limit', () => {
      const decoder = new LineDecoder(8);

      expect(() => decoder.push('123456789')).toThrow(ProtocolError);
      expect(() => new LineDecoder(8).push('123456789\n')).toThrow('Relay message exceeds 8 bytes');
    });
  });
});
