/**
 * Relay Transport Server
 *
 * Local-only socket server that waiting consumers connect to. Listens on a
 * unix domain socket, or on a loopback TCP port when configured to. Each
 * connection gets one read loop that accepts a single registration and, once
 * the coordinator settles the wait, writes the outcome back and closes.
 */

import { randomUUID } from 'crypto';
import { chmod, mkdir, rm } from 'fs/promises';
import { createServer, Server, Socket } from 'net';
import { dirname } from 'path';
import { OAuthRegistrationError, ProtocolError } from '../types/errors.js';
import { transportLogger } from '../utils/logger.js';
import type { RelayCoordinator } from './coordinator.js';
import {
  LineDecoder,
  MAX_LINE_BYTES,
  decodeMessage,
  encodeMessage,
  outcomeToMessage,
  type RelayMessage,
} from './protocol.js';
import { describeEndpoint, type RelayEndpoint, type WaitTicket } from './types.js';

/**
 * Transport server options
 */
export interface RelayTransportServerOptions {
  coordinator: RelayCoordinator;
  endpoint: RelayEndpoint;
  /** Time a new connection has to send its registration (default: 10000) */
  registrationTimeoutMs?: number;
  /** Longest accepted message line in bytes (default: 64 KiB) */
  maxLineBytes?: number;
  /** Time stop() lets open connections flush before destroying them (default: 1000) */
  shutdownGraceMs?: number;
}

/**
 * Per-connection state
 */
interface ConnectionState {
  id: string;
  ticket: WaitTicket | null;
  forwarding: Promise<void> | null;
  closing: boolean;
}

const DEFAULT_REGISTRATION_TIMEOUT_MS = 10000;
const DEFAULT_SHUTDOWN_GRACE_MS = 1000;

export class RelayTransportServer {
  private readonly coordinator: RelayCoordinator;
  private readonly endpoint: RelayEndpoint;
  private readonly registrationTimeoutMs: number;
  private readonly maxLineBytes: number;
  private readonly shutdownGraceMs: number;
  private server: Server | null = null;
  private boundEndpoint: RelayEndpoint | null = null;
  private readonly connections: Set<Socket> = new Set();
  private readonly tasks: Set<Promise<void>> = new Set();

  constructor(options: RelayTransportServerOptions) {
    this.coordinator = options.coordinator;
    this.endpoint = options.endpoint;
    this.registrationTimeoutMs = options.registrationTimeoutMs ?? DEFAULT_REGISTRATION_TIMEOUT_MS;
    this.maxLineBytes = options.maxLineBytes ?? MAX_LINE_BYTES;
    this.shutdownGraceMs = options.shutdownGraceMs ?? DEFAULT_SHUTDOWN_GRACE_MS;
  }

  /**
   * Start listening
   *
   * A stale socket file left by an earlier run is removed first.
   *
   * @returns The endpoint actually bound (TCP port 0 resolves to the chosen port)
   * @throws Error if already running or the endpoint cannot be bound
   */
  async start(): Promise<RelayEndpoint> {
    if (this.server) {
      throw new Error('Relay transport is already running');
    }

    const endpoint = this.endpoint;
    if (endpoint.type === 'unix') {
      await mkdir(dirname(endpoint.path), { recursive: true, mode: 0o700 });
      await rm(endpoint.path, { force: true });
    }

    const server = createServer((socket) => this.handleConnection(socket));

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      const onListening = (): void => {
        server.removeListener('error', reject);
        resolve();
      };
      if (endpoint.type === 'unix') {
        server.listen(endpoint.path, onListening);
      } else {
        server.listen(endpoint.port, endpoint.host, onListening);
      }
    });

    server.on('error', (error) => {
      transportLogger.error({ err: error }, 'Relay socket server error');
    });

    if (endpoint.type === 'unix') {
      await chmod(endpoint.path, 0o600);
      this.boundEndpoint = endpoint;
    } else {
      const address = server.address();
      const port = address !== null && typeof address === 'object' ? address.port : endpoint.port;
      this.boundEndpoint = { type: 'tcp', host: endpoint.host, port };
    }

    this.server = server;
    transportLogger.info({ endpoint: describeEndpoint(this.boundEndpoint) }, 'Relay transport listening');
    return this.boundEndpoint;
  }

  /**
   * Stop accepting connections, give open ones a moment to flush, then
   * destroy the rest and remove the socket file
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;

    const closed = new Promise<void>((resolve) => {
      server.close(() => resolve());
    });

    let graceTimer: NodeJS.Timeout | undefined;
    const grace = new Promise<void>((resolve) => {
      graceTimer = setTimeout(resolve, this.shutdownGraceMs);
    });
    await Promise.race([Promise.allSettled([...this.tasks]), grace]);
    clearTimeout(graceTimer);

    for (const socket of this.connections) {
      socket.destroy();
    }
    await closed;
    await Promise.allSettled([...this.tasks]);

    if (this.endpoint.type === 'unix') {
      await rm(this.endpoint.path, { force: true });
    }
    this.boundEndpoint = null;
    transportLogger.info('Relay transport stopped');
  }

  /**
   * Endpoint the server is bound to, or null when stopped
   */
  getEndpoint(): RelayEndpoint | null {
    return this.boundEndpoint;
  }

  isRunning(): boolean {
    return this.server !== null;
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  private handleConnection(socket: Socket): void {
    this.connections.add(socket);
    const task = this.serveConnection(socket).finally(() => {
      this.connections.delete(socket);
      this.tasks.delete(task);
    });
    this.tasks.add(task);
  }

  /**
   * Read loop for one consumer connection
   */
  private async serveConnection(socket: Socket): Promise<void> {
    const connection: ConnectionState = {
      id: randomUUID(),
      ticket: null,
      forwarding: null,
      closing: false,
    };
    const log = transportLogger.child({ connectionId: connection.id });
    const decoder = new LineDecoder(this.maxLineBytes);

    socket.on('error', (error) => {
      log.debug({ err: error }, 'Consumer socket error');
    });

    const registrationTimer = setTimeout(() => {
      if (!connection.ticket) {
        log.warn('No registration received in time, closing connection');
        socket.destroy();
      }
    }, this.registrationTimeoutMs);

    log.debug('Consumer connected');

    try {
      for await (const chunk of socket) {
        if (connection.closing) {
          continue;
        }
        try {
          for (const line of decoder.push(chunk)) {
            this.handleMessage(socket, connection, decodeMessage(line));
            if (connection.closing) {
              break;
            }
          }
        } catch (error) {
          if (!(error instanceof ProtocolError)) {
            throw error;
          }
          log.warn({ code: error.code, details: error.details }, error.message);
          this.close(socket, connection, { type: 'error', code: error.code, message: error.message });
        }
      }
      log.debug('Consumer disconnected');
    } catch (error) {
      log.debug({ err: error }, 'Consumer connection ended abruptly');
    } finally {
      clearTimeout(registrationTimer);
      if (decoder.pending > 0) {
        log.debug({ bytes: decoder.pending }, 'Discarding incomplete message');
      }
      if (this.coordinator.cancelByConnectionLoss(connection.id)) {
        log.info('Consumer went away before its wait resolved');
      }
      if (connection.forwarding) {
        await connection.forwarding;
      }
    }
  }

  /**
   * Act on one message from a consumer
   * @throws ProtocolError for messages a consumer may not send
   */
  private handleMessage(socket: Socket, connection: ConnectionState, message: RelayMessage): void {
    switch (message.type) {
      case 'register': {
        if (connection.ticket) {
          throw new ProtocolError('ALREADY_REGISTERED', 'Connection already registered a wait');
        }
        let ticket: WaitTicket;
        try {
          ticket = this.coordinator.register(message.state, {
            connectionId: connection.id,
            timeoutMs: message.timeoutMs,
          });
        } catch (error) {
          if (!(error instanceof OAuthRegistrationError)) {
            throw error;
          }
          transportLogger.warn({ connectionId: connection.id, code: error.code }, error.message);
          this.close(socket, connection, { type: 'error', code: error.code, message: error.message });
          return;
        }
        connection.ticket = ticket;
        this.send(socket, { type: 'registered', state: message.state ?? null });
        connection.forwarding = this.forwardOutcome(socket, connection, ticket);
        return;
      }
      case 'unregister':
        this.coordinator.cancel(connection.id);
        return;
      default:
        throw new ProtocolError('UNEXPECTED_MESSAGE', `Consumers may not send "${message.type}" messages`);
    }
  }

  /**
   * Wait for the coordinator to settle the ticket, then report it and close
   */
  private async forwardOutcome(socket: Socket, connection: ConnectionState, ticket: WaitTicket): Promise<void> {
    const outcome = await ticket.outcome;
    if (!socket.writable) {
      return;
    }
    const message = outcomeToMessage(outcome);
    this.close(socket, connection, message ?? undefined);
  }

  private send(socket: Socket, message: RelayMessage): void {
    if (socket.writable) {
      socket.write(encodeMessage(message));
    }
  }

  /**
   * End the connection after flushing an optional final message
   */
  private close(socket: Socket, connection: ConnectionState, message?: RelayMessage): void {
    if (connection.closing) {
      return;
    }
    connection.closing = true;
    if (!socket.writable) {
      socket.destroy();
      return;
    }
    const destroy = (): void => {
      socket.destroy();
    };
    if (message) {
      socket.end(encodeMessage(message), destroy);
    } else {
      socket.end(destroy);
    }
  }
}
