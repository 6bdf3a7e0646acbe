/**
 * Relay wire protocol
 *
 * Newline-delimited JSON between the coordinator and waiting consumers.
 * Every message is one JSON object on one line, in both directions.
 */

import { StringDecoder } from 'string_decoder';
import { z } from 'zod';
import { ProtocolError } from '../types/errors.js';
import type { CallbackPayload, RelayResult, WaitOutcome } from './types.js';

/** Longest accepted line, in bytes */
export const MAX_LINE_BYTES = 64 * 1024;

/** Largest callback body the HTTP ingress accepts, in bytes */
export const MAX_CALLBACK_BODY_BYTES = 1024 * 1024;

/**
 * Longest `deliver` line a consumer accepts. JSON escaping writes a control
 * character as six bytes, so this covers the largest callback body together
 * with its query string.
 */
export const MAX_DELIVERY_LINE_BYTES = 8 * MAX_CALLBACK_BODY_BYTES;

const CallbackPayloadSchema = z.record(z.union([z.string(), z.array(z.string())]));

export const RegisterMessageSchema = z.object({
  type: z.literal('register'),
  state: z.string().nullable().optional(),
  timeoutMs: z.number().int().positive().optional(),
});

export const UnregisterMessageSchema = z.object({
  type: z.literal('unregister'),
});

export const RegisteredMessageSchema = z.object({
  type: z.literal('registered'),
  state: z.string().nullable(),
});

export const DeliverMessageSchema = z.object({
  type: z.literal('deliver'),
  success: z.boolean(),
  code: z.string().nullable().optional(),
  raw: CallbackPayloadSchema.nullable().optional(),
  reason: z.enum(['superseded', 'timeout', 'shutdown']).optional(),
});

export const ErrorMessageSchema = z.object({
  type: z.literal('error'),
  code: z.string(),
  message: z.string(),
});

export const RelayMessageSchema = z.discriminatedUnion('type', [
  RegisterMessageSchema,
  UnregisterMessageSchema,
  RegisteredMessageSchema,
  DeliverMessageSchema,
  ErrorMessageSchema,
]);

export type RegisterMessage = z.infer<typeof RegisterMessageSchema>;
export type UnregisterMessage = z.infer<typeof UnregisterMessageSchema>;
export type RegisteredMessage = z.infer<typeof RegisteredMessageSchema>;
export type DeliverMessage = z.infer<typeof DeliverMessageSchema>;
export type ErrorMessage = z.infer<typeof ErrorMessageSchema>;
export type RelayMessage = z.infer<typeof RelayMessageSchema>;

/**
 * Serialize a message as one newline-terminated line
 */
export function encodeMessage(message: RelayMessage): string {
  return `${JSON.stringify(message)}\n`;
}

/**
 * Parse and validate one line
 * @throws ProtocolError if the line is not a valid relay message
 */
export function decodeMessage(line: string): RelayMessage {
  let data: unknown;
  try {
    data = JSON.parse(line);
  } catch (error) {
    throw new ProtocolError('INVALID_JSON', 'Relay message is not valid JSON', { cause: error });
  }

  const result = RelayMessageSchema.safeParse(data);
  if (!result.success) {
    throw new ProtocolError('INVALID_MESSAGE', 'Relay message does not match the protocol', {
      details: result.error.issues.map((issue) => issue.message),
    });
  }
  return result.data;
}

/**
 * Wire form of a wait outcome. Cancellations the consumer caused itself
 * produce no message.
 */
export function outcomeToMessage(outcome: WaitOutcome): DeliverMessage | null {
  switch (outcome.kind) {
    case 'delivered':
      return outcome.result.success
        ? { type: 'deliver', success: true, code: outcome.result.code, raw: null }
        : { type: 'deliver', success: false, code: null, raw: outcome.result.raw };
    case 'superseded':
      return { type: 'deliver', success: false, reason: 'superseded' };
    case 'timed_out':
      return { type: 'deliver', success: false, reason: 'timeout' };
    case 'cancelled':
      return outcome.reason === 'shutdown'
        ? { type: 'deliver', success: false, reason: 'shutdown' }
        : null;
  }
}

/**
 * Result carried by a plain delivery, or null if the message is a failure notice
 */
export function messageToResult(message: DeliverMessage): RelayResult | null {
  if (message.reason) {
    return null;
  }
  if (message.success && message.code) {
    return { success: true, code: message.code };
  }
  const raw: CallbackPayload = message.raw ?? {};
  return { success: false, raw };
}

/**
 * Splits an incoming byte stream into lines
 */
export class LineDecoder {
  private buffer = '';
  private readonly text = new StringDecoder('utf8');
  private readonly maxLineBytes: number;

  constructor(maxLineBytes: number = MAX_LINE_BYTES) {
    this.maxLineBytes = maxLineBytes;
  }

  /**
   * Feed a chunk and return every complete, non-blank line it finished
   * @throws ProtocolError if a line exceeds the size limit
   */
  push(chunk: Buffer | string): string[] {
    this.buffer += typeof chunk === 'string' ? chunk : this.text.write(chunk);

    const lines: string[] = [];
    let newline = this.buffer.indexOf('\n');
    while (newline !== -1) {
      const line = this.buffer.slice(0, newline).trim();
      this.buffer = this.buffer.slice(newline + 1);
      this.checkLength(line);
      if (line.length > 0) {
        lines.push(line);
      }
      newline = this.buffer.indexOf('\n');
    }

    this.checkLength(this.buffer);
    return lines;
  }

  /**
   * Bytes received after the last newline
   */
  get pending(): number {
    return Buffer.byteLength(this.buffer);
  }

  private checkLength(text: string): void {
    if (Buffer.byteLength(text) > this.maxLineBytes) {
      throw new ProtocolError(
        'LINE_TOO_LONG',
        `Relay message exceeds ${this.maxLineBytes} bytes`
      );
    }
  }
}
