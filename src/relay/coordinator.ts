/**
 * OAuth Relay Coordinator
 *
 * Owns the table of pending waits, keyed by correlation key (the OAuth
 * `state`, or DEFAULT_STATE_KEY in single-slot mode). Every operation is a
 * synchronous table mutation on the event loop, so register, deliver, expire
 * and cancel are serialized against each other without a lock. Writing the
 * outcome to a consumer happens later, outside the table, through the
 * ticket's `outcome` promise.
 */

import { OAuthRegistrationError } from '../types/errors.js';
import { relayLogger } from '../utils/logger.js';
import {
  DEFAULT_STATE_KEY,
  createRelayResult,
  toCorrelationKey,
  type CallbackPayload,
  type CancelReason,
  type DeliveryOutcome,
  type PendingWaitInfo,
  type WaitOutcome,
  type WaitTicket,
} from './types.js';

/**
 * Coordinator options
 */
export interface RelayCoordinatorOptions {
  /** Wait timeout when a registration names no deadline (default: 300000 = 5 minutes) */
  defaultTimeoutMs?: number;
}

/**
 * Registration options
 */
export interface RegisterOptions {
  /** Identifies the consumer connection that owns the wait */
  connectionId: string;
  /** Absolute deadline (epoch ms); must not be in the past */
  deadline?: number;
  /** Relative timeout, used when no deadline is given */
  timeoutMs?: number;
}

interface PendingWait {
  key: string;
  connectionId: string;
  createdAt: number;
  deadline: number;
  resolved: boolean;
  timer: NodeJS.Timeout;
  settle: (outcome: WaitOutcome) => void;
}

const DEFAULT_TIMEOUT_MS = 300000;

/** Longest delay setTimeout accepts */
const MAX_TIMER_MS = 2 ** 31 - 1;

export class RelayCoordinator {
  private readonly pending: Map<string, PendingWait> = new Map();
  private readonly byConnection: Map<string, string> = new Map();
  private readonly defaultTimeoutMs: number;
  private stopped = false;

  constructor(options?: RelayCoordinatorOptions) {
    this.defaultTimeoutMs = options?.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Register a wait for the callback carrying `state`
   *
   * A registration without state replaces any earlier one without state; the
   * earlier consumer is told it was superseded. An explicit state that is
   * already pending is rejected.
   *
   * @throws OAuthRegistrationError if the key is taken or reserved, the
   * connection already waits, the deadline is in the past, or the coordinator
   * is stopped
   */
  register(state: string | null | undefined, options: RegisterOptions): WaitTicket {
    if (this.stopped) {
      throw new OAuthRegistrationError('COORDINATOR_STOPPED', 'Relay coordinator is shutting down');
    }
    if (state === DEFAULT_STATE_KEY) {
      throw new OAuthRegistrationError(
        'RESERVED_STATE',
        `State ${JSON.stringify(state)} is reserved for waits without state`
      );
    }

    const key = toCorrelationKey(state);
    const now = Date.now();
    const deadline = options.deadline ?? now + (options.timeoutMs ?? this.defaultTimeoutMs);

    if (deadline < now) {
      throw new OAuthRegistrationError(
        'INVALID_DEADLINE',
        `Deadline ${new Date(deadline).toISOString()} is in the past`
      );
    }
    if (deadline - now > MAX_TIMER_MS) {
      throw new OAuthRegistrationError('INVALID_DEADLINE', 'Deadline is too far in the future');
    }

    if (this.byConnection.has(options.connectionId)) {
      throw new OAuthRegistrationError(
        'CONNECTION_BUSY',
        'Connection already has a pending wait'
      );
    }

    const existing = this.pending.get(key);
    if (existing) {
      if (key !== DEFAULT_STATE_KEY) {
        throw new OAuthRegistrationError(
          'DUPLICATE_STATE',
          `A wait is already pending for state ${JSON.stringify(key)}`
        );
      }
      this.resolve(existing, { kind: 'superseded' });
      relayLogger.info({ key }, 'Superseded previous registration');
    }

    let settle: (outcome: WaitOutcome) => void = () => undefined;
    const outcome = new Promise<WaitOutcome>((resolvePromise) => {
      settle = resolvePromise;
    });

    const wait: PendingWait = {
      key,
      connectionId: options.connectionId,
      createdAt: now,
      deadline,
      resolved: false,
      timer: setTimeout(() => this.expire(key), deadline - now),
      settle,
    };

    this.pending.set(key, wait);
    this.byConnection.set(options.connectionId, key);
    relayLogger.info({ key, timeoutMs: deadline - now }, 'Registered wait');

    return {
      key,
      connectionId: wait.connectionId,
      createdAt: wait.createdAt,
      deadline: wait.deadline,
      outcome,
    };
  }

  /**
   * Hand a callback to the consumer waiting for `state`
   *
   * Falls back to the single-slot key only when the callback carried no
   * state at all; a callback whose state is the reserved key itself matches
   * nothing. Never throws: a callback nobody waits for, including a
   * replay of one already delivered, is reported as `unmatched` and the
   * caller decides how to answer and whether to log it.
   */
  deliver(
    state: string | null | undefined,
    payload: CallbackPayload,
    code: string | undefined
  ): DeliveryOutcome {
    const key = toCorrelationKey(state);
    const wait = state === DEFAULT_STATE_KEY ? undefined : this.pending.get(key);

    if (!wait || wait.resolved) {
      relayLogger.debug({ key }, 'Callback matched no pending wait');
      return 'unmatched';
    }

    this.resolve(wait, { kind: 'delivered', result: createRelayResult(code, payload) });
    relayLogger.info({ key, success: code !== undefined }, 'Delivered callback');
    return 'matched';
  }

  /**
   * Resolve the wait for `key` as timed out
   */
  expire(key: string): void {
    const wait = this.pending.get(key);
    if (!wait) {
      return;
    }
    this.resolve(wait, { kind: 'timed_out' });
    relayLogger.warn({ key }, 'Wait timed out before a callback arrived');
  }

  /**
   * Explicit unregister from the consumer (timeout or cancellation on its side)
   */
  cancel(connectionId: string): boolean {
    return this.cancelConnection(connectionId, 'unregistered');
  }

  /**
   * Drop the wait owned by a connection that went away, without delivering
   */
  cancelByConnectionLoss(connectionId: string): boolean {
    return this.cancelConnection(connectionId, 'connection_lost');
  }

  /**
   * Resolve every pending wait as shut down and refuse new registrations
   */
  stop(): void {
    this.stopped = true;
    for (const wait of [...this.pending.values()]) {
      this.resolve(wait, { kind: 'cancelled', reason: 'shutdown' });
    }
    relayLogger.info('Relay coordinator stopped');
  }

  /**
   * Number of pending waits
   */
  get size(): number {
    return this.pending.size;
  }

  /**
   * Whether a wait is pending for `state`
   */
  has(state: string | null | undefined): boolean {
    return this.pending.has(toCorrelationKey(state));
  }

  snapshot(): PendingWaitInfo[] {
    return [...this.pending.values()].map((wait) => ({
      key: wait.key,
      connectionId: wait.connectionId,
      createdAt: wait.createdAt,
      deadline: wait.deadline,
    }));
  }

  private cancelConnection(connectionId: string, reason: CancelReason): boolean {
    const key = this.byConnection.get(connectionId);
    const wait = key === undefined ? undefined : this.pending.get(key);
    if (!wait || wait.connectionId !== connectionId) {
      return false;
    }
    this.resolve(wait, { kind: 'cancelled', reason });
    relayLogger.info({ key: wait.key, reason }, 'Cancelled wait');
    return true;
  }

  /**
   * The only transition out of Pending: mark resolved, remove, then settle
   */
  private resolve(wait: PendingWait, outcome: WaitOutcome): void {
    if (wait.resolved) {
      return;
    }
    wait.resolved = true;
    clearTimeout(wait.timer);
    if (this.pending.get(wait.key) === wait) {
      this.pending.delete(wait.key);
    }
    if (this.byConnection.get(wait.connectionId) === wait.key) {
      this.byConnection.delete(wait.connectionId);
    }
    wait.settle(outcome);
  }
}
