/**
 * OAuth Relay Module Exports
 */

// Types
export * from './types.js';

// Extraction
export { DEFAULT_CODE_KEYS, extractCode, extractState, findValue } from './extractor.js';

// Wire protocol
export {
  LineDecoder,
  MAX_LINE_BYTES,
  decodeMessage,
  encodeMessage,
  type DeliverMessage,
  type RelayMessage,
} from './protocol.js';

// Coordinator
export { RelayCoordinator, type RegisterOptions, type RelayCoordinatorOptions } from './coordinator.js';

// Transport
export { RelayTransportServer, type RelayTransportServerOptions } from './transport.js';

// HTTP callback ingress
export {
  CallbackServer,
  mergeCallbackPayload,
  parseCallbackBody,
  type CallbackServerOptions,
  type HealthCheckResponse,
} from './callback-server.js';

// Client
export { waitForCode, type WaitForCodeOptions } from './client.js';
