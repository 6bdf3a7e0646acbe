/**
 * OAuth relay client
 *
 * Consumer-side API: connect to the local coordinator, register for a
 * callback and suspend until it is delivered, superseded or timed out.
 */

import { createConnection, Socket } from 'net';
import { loadRelayConfig, resolveEndpoint } from '../config/relay-config.js';
import {
  OAuthCancelledError,
  OAuthConnectionError,
  OAuthRegistrationError,
  OAuthSupersededError,
  OAuthTimeoutError,
  ProtocolError,
} from '../types/errors.js';
import { relayLogger } from '../utils/logger.js';
import {
  LineDecoder,
  MAX_DELIVERY_LINE_BYTES,
  decodeMessage,
  encodeMessage,
  messageToResult,
  type RelayMessage,
} from './protocol.js';
import { describeEndpoint, type RelayEndpoint, type RelayResult } from './types.js';

/**
 * Options for waitForCode
 */
export interface WaitForCodeOptions {
  /** Maximum time to wait for the callback; defaults to the configured default timeout */
  timeoutMs?: number;
  /** Maximum time to establish the connection (default: 10000) */
  connectTimeoutMs?: number;
  /** Coordinator endpoint; defaults to the one resolved from OAUTH_RELAY_* settings */
  endpoint?: RelayEndpoint;
  /** Aborting unregisters the wait and rejects with OAuthCancelledError */
  signal?: AbortSignal;
  /** Called once the coordinator confirmed the registration */
  onRegistered?: () => void;
}

const DEFAULT_CONNECT_TIMEOUT_MS = 10000;
/** Time to wait for the coordinator to close after `unregister` */
const UNREGISTER_GRACE_MS = 2000;
const MAX_TIMEOUT_MS = 2 ** 31 - 1;

function errnoCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

function toConnectionError(error: Error, endpoint: RelayEndpoint): OAuthConnectionError {
  const where = describeEndpoint(endpoint);
  switch (errnoCode(error)) {
    case 'ENOENT':
      return new OAuthConnectionError('SOCKET_NOT_FOUND', `Relay coordinator socket not found at ${where}`, {
        cause: error,
      });
    case 'ECONNREFUSED':
      return new OAuthConnectionError('CONNECTION_REFUSED', `Cannot connect to relay coordinator on ${where}`, {
        cause: error,
      });
    default:
      return new OAuthConnectionError('CONNECT_FAILED', `Failed to connect to relay coordinator: ${error.message}`, {
        cause: error,
      });
  }
}

/**
 * Open a connection to the coordinator
 * @throws OAuthConnectionError if it cannot be reached in time
 */
function connect(endpoint: RelayEndpoint, timeoutMs: number): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const socket =
      endpoint.type === 'unix'
        ? createConnection(endpoint.path)
        : createConnection(endpoint.port, endpoint.host);

    const onError = (error: Error): void => {
      clearTimeout(timer);
      socket.destroy();
      reject(toConnectionError(error, endpoint));
    };
    const timer = setTimeout(() => {
      socket.removeListener('error', onError);
      socket.destroy();
      reject(
        new OAuthConnectionError(
          'CONNECT_TIMEOUT',
          `Timeout connecting to relay coordinator at ${describeEndpoint(endpoint)} (is the relay server running?)`
        )
      );
    }, timeoutMs);

    socket.once('error', onError);
    socket.once('connect', () => {
      clearTimeout(timer);
      socket.removeListener('error', onError);
      resolve(socket);
    });
  });
}

/**
 * Register on an open connection and wait for the outcome
 */
function awaitDelivery(
  socket: Socket,
  state: string | null,
  timeoutMs: number,
  options: WaitForCodeOptions
): Promise<RelayResult> {
  return new Promise((resolve, reject) => {
    const decoder = new LineDecoder(MAX_DELIVERY_LINE_BYTES);
    let settled = false;
    let registered = false;

    const finish = (outcome: { result: RelayResult } | { error: Error }, unregister: boolean): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);

      release(unregister, () => {
        if ('result' in outcome) {
          resolve(outcome.result);
        } else {
          reject(outcome.error);
        }
      });
    };

    // The coordinator drops the wait on `unregister` and then closes the
    // connection, so 'close' means the table entry is gone.
    const release = (unregister: boolean, done: () => void): void => {
      if (!unregister || !socket.writable) {
        socket.destroy();
        done();
        return;
      }
      const grace = setTimeout(() => socket.destroy(), UNREGISTER_GRACE_MS);
      socket.once('close', () => {
        clearTimeout(grace);
        done();
      });
      socket.write(encodeMessage({ type: 'unregister' }));
    };

    const fail = (error: Error): void => finish({ error }, false);
    const abandon = (error: Error): void => finish({ error }, true);

    const handleMessage = (message: RelayMessage): void => {
      switch (message.type) {
        case 'registered':
          if (!registered) {
            registered = true;
            relayLogger.debug({ state }, 'Registration confirmed');
            try {
              options.onRegistered?.();
            } catch (error) {
              abandon(error instanceof Error ? error : new Error(String(error)));
            }
          }
          return;
        case 'deliver': {
          const result = messageToResult(message);
          if (result) {
            finish({ result }, false);
          } else if (message.reason === 'superseded') {
            fail(new OAuthSupersededError());
          } else if (message.reason === 'timeout') {
            fail(new OAuthTimeoutError(`Timeout waiting for OAuth callback after ${timeoutMs / 1000}s`));
          } else {
            fail(new OAuthConnectionError('COORDINATOR_SHUTDOWN', 'Relay coordinator shut down before a callback arrived'));
          }
          return;
        }
        case 'error':
          fail(new OAuthRegistrationError(message.code, message.message));
          return;
        default:
          fail(new ProtocolError('UNEXPECTED_MESSAGE', `Unexpected "${message.type}" message from coordinator`));
      }
    };

    const onAbort = (): void => abandon(new OAuthCancelledError());

    const timer = setTimeout(() => {
      abandon(new OAuthTimeoutError(`Timeout waiting for OAuth callback after ${timeoutMs / 1000}s`));
    }, timeoutMs);

    socket.on('data', (chunk: Buffer) => {
      try {
        for (const line of decoder.push(chunk)) {
          handleMessage(decodeMessage(line));
          if (settled) {
            return;
          }
        }
      } catch (error) {
        fail(error instanceof Error ? error : new Error(String(error)));
      }
    });

    socket.on('error', (error) => {
      fail(
        new OAuthConnectionError('CONNECTION_ERROR', `Relay connection failed: ${error.message}`, {
          cause: error,
        })
      );
    });

    socket.on('close', () => {
      fail(
        new OAuthConnectionError(
          'CONNECTION_CLOSED',
          'Relay coordinator closed the connection without sending a result'
        )
      );
    });

    options.signal?.addEventListener('abort', onAbort, { once: true });

    socket.write(encodeMessage({ type: 'register', state, timeoutMs }));
    relayLogger.debug({ state, timeoutMs }, 'Sent registration');
  });
}

/**
 * Wait for an OAuth authorization code relayed by the coordinator
 *
 * Pass the `state` used in the authorization URL, or null when the flow uses
 * no state (single-slot mode: a newer wait without state supersedes this one).
 * The literal state `__default__` names the single slot internally and is
 * refused with `RESERVED_STATE`.
 *
 * @example
 * ```typescript
 * const result = await waitForCode('f3b1c2', {
 *   timeoutMs: 120000,
 *   onRegistered: () => openBrowser(authorizationUrl),
 * });
 * if (result.success) {
 *   await exchangeCode(result.code);
 * }
 * ```
 *
 * @throws OAuthConnectionError if the coordinator cannot be reached or drops the connection
 * @throws OAuthTimeoutError if no callback arrives in time
 * @throws OAuthSupersededError if a newer single-slot wait displaced this one
 * @throws OAuthRegistrationError if the coordinator refused the registration
 * @throws OAuthCancelledError if `signal` is aborted
 */
export async function waitForCode(
  state: string | null = null,
  options: WaitForCodeOptions = {}
): Promise<RelayResult> {
  let endpoint: RelayEndpoint;
  let timeoutMs: number;
  if (options.endpoint !== undefined && options.timeoutMs !== undefined) {
    endpoint = options.endpoint;
    timeoutMs = options.timeoutMs;
  } else {
    const config = await loadRelayConfig();
    endpoint = options.endpoint ?? resolveEndpoint(config);
    timeoutMs = options.timeoutMs ?? config.defaultTimeoutMs;
  }

  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0 || timeoutMs > MAX_TIMEOUT_MS) {
    throw new OAuthRegistrationError('INVALID_TIMEOUT', `Invalid wait timeout: ${timeoutMs}ms`);
  }
  if (options.signal?.aborted) {
    throw new OAuthCancelledError();
  }

  const socket = await connect(endpoint, options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS);
  if (options.signal?.aborted) {
    socket.destroy();
    throw new OAuthCancelledError();
  }

  return awaitDelivery(socket, state, Math.ceil(timeoutMs), options);
}
