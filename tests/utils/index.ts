/**
 * Test Utilities
 *
 * In-process socket and HTTP helpers for relay tests.
 */

export {
  createTempSocketPath,
  httpRequest,
  waitUntil,
  RawConsumer,
  type TempSocketPath,
  type HttpRequestOptions,
  type HttpResponse,
} from './relay-test-utils.js';
