/**
 * OAuth relay type definitions
 */

/**
 * Correlation key used when a flow carries no `state`.
 * At most one wait may be pending under it (single-slot mode).
 */
export const DEFAULT_STATE_KEY = '__default__';

/**
 * Flattened callback parameters merged from query string, form body or JSON body
 */
export type CallbackPayload = Record<string, string | string[]>;

/**
 * Result handed to the waiting consumer.
 * `success` is true exactly when an authorization code was extracted;
 * otherwise the whole payload is returned for inspection.
 */
export type RelayResult =
  | { success: true; code: string; raw?: undefined }
  | { success: false; code?: undefined; raw: CallbackPayload };

export type CancelReason = 'connection_lost' | 'unregistered' | 'shutdown';

/**
 * Terminal outcome of a pending wait
 */
export type WaitOutcome =
  | { kind: 'delivered'; result: RelayResult }
  | { kind: 'superseded' }
  | { kind: 'timed_out' }
  | { kind: 'cancelled'; reason: CancelReason };

export type DeliveryOutcome = 'matched' | 'unmatched';

/**
 * Handle returned by a successful registration.
 * `outcome` settles exactly once, when the wait leaves the table.
 */
export interface WaitTicket {
  key: string;
  connectionId: string;
  createdAt: number;
  deadline: number;
  outcome: Promise<WaitOutcome>;
}

/**
 * Read-only view of a pending wait
 */
export interface PendingWaitInfo {
  key: string;
  connectionId: string;
  createdAt: number;
  deadline: number;
}

/**
 * Where the coordinator's socket listens
 */
export type RelayEndpoint =
  | { type: 'unix'; path: string }
  | { type: 'tcp'; host: string; port: number };

/**
 * Build a RelayResult from an optional extracted code
 */
export function createRelayResult(code: string | undefined, raw: CallbackPayload): RelayResult {
  if (code !== undefined) {
    return { success: true, code };
  }
  return { success: false, raw };
}

/**
 * Map an optional `state` value to its correlation key
 */
export function toCorrelationKey(state: string | null | undefined): string {
  return state ? state : DEFAULT_STATE_KEY;
}

export function describeEndpoint(endpoint: RelayEndpoint): string {
  return endpoint.type === 'unix' ? endpoint.path : `${endpoint.host}:${endpoint.port}`;
}
