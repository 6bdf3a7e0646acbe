/**
 * Relay Test Utilities
 *
 * In-process helpers for exercising the relay over real sockets: temporary
 * unix socket paths, a raw line-protocol consumer and a small HTTP client.
 *
 * @example
 * ```typescript
 * const socket = await createTempSocketPath();
 * const consumer = await RawConsumer.connect({ type: 'unix', path: socket.path });
 * consumer.send({ type: 'register', state: 's1' });
 * expect(await consumer.nextMessage()).toEqual({ type: 'registered', state: 's1' });
 * ```
 */

import { mkdtemp, rm } from 'fs/promises';
import http from 'http';
import { createConnection, Socket } from 'net';
import { tmpdir } from 'os';
import { join } from 'path';
import { LineDecoder, decodeMessage, encodeMessage, type RelayMessage } from '../../src/relay/protocol.js';
import type { RelayEndpoint } from '../../src/relay/types.js';

/**
 * Temporary directory holding a socket path
 */
export interface TempSocketPath {
  path: string;
  cleanup: () => Promise<void>;
}

export async function createTempSocketPath(): Promise<TempSocketPath> {
  const dir = await mkdtemp(join(tmpdir(), 'relay-test-'));
  return {
    path: join(dir, 'relay.sock'),
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}

/**
 * Poll until the predicate holds
 * @throws Error if it does not hold within maxTimeout
 */
export async function waitUntil(
  predicate: () => boolean,
  maxTimeout = 2000,
  pollInterval = 5
): Promise<void> {
  const startTime = Date.now();
  while (!predicate()) {
    if (Date.now() - startTime > maxTimeout) {
      throw new Error(`Condition not met within ${maxTimeout}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, pollInterval));
  }
}

/**
 * A consumer that speaks the line protocol directly
 */
export class RawConsumer {
  private readonly decoder = new LineDecoder();
  private readonly messages: RelayMessage[] = [];
  private readonly waiters: Array<(message: RelayMessage | null) => void> = [];
  private ended = false;
  readonly closed: Promise<void>;

  private constructor(readonly socket: Socket) {
    socket.on('data', (chunk: Buffer) => {
      for (const line of this.decoder.push(chunk)) {
        const message = decodeMessage(line);
        const waiter = this.waiters.shift();
        if (waiter) {
          waiter(message);
        } else {
          this.messages.push(message);
        }
      }
    });
    socket.on('error', () => undefined);
    this.closed = new Promise((resolve) => {
      socket.on('close', () => {
        this.ended = true;
        for (const waiter of this.waiters.splice(0)) {
          waiter(null);
        }
        resolve();
      });
    });
  }

  static connect(endpoint: RelayEndpoint): Promise<RawConsumer> {
    return new Promise((resolve, reject) => {
      const socket =
        endpoint.type === 'unix'
          ? createConnection(endpoint.path)
          : createConnection(endpoint.port, endpoint.host);
      socket.once('error', reject);
      socket.once('connect', () => {
        socket.removeListener('error', reject);
        resolve(new RawConsumer(socket));
      });
    });
  }

  send(message: RelayMessage): void {
    this.socket.write(encodeMessage(message));
  }

  sendRaw(text: string): void {
    this.socket.write(text);
  }

  /**
   * Next message from the server, or null once the connection closed
   */
  nextMessage(): Promise<RelayMessage | null> {
    const queued = this.messages.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    if (this.ended) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  destroy(): void {
    this.socket.destroy();
  }
}

/**
 * Response from httpRequest
 */
export interface HttpResponse {
  statusCode: number;
  headers: http.IncomingHttpHeaders;
  body: string;
}

export interface HttpRequestOptions {
  method?: string;
  body?: string;
  headers?: http.OutgoingHttpHeaders;
}

/**
 * Send a request to a loopback server
 */
export function httpRequest(port: number, path: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
  return new Promise((resolve, reject) => {
    const req = http.request(
      {
        hostname: '127.0.0.1',
        port,
        path,
        method: options.method ?? 'GET',
        headers: options.headers,
      },
      (res) => {
        let body = '';
        res.setEncoding('utf8');
        res.on('data', (chunk: string) => {
          body += chunk;
        });
        res.on('end', () => {
          resolve({ statusCode: res.statusCode ?? 0, headers: res.headers, body });
        });
        res.on('error', reject);
      }
    );
    req.on('error', reject);
    if (options.body !== undefined) {
      req.write(options.body);
    }
    req.end();
  });
}
