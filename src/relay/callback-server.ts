/**
 * OAuth Callback Server
 *
 * HTTP endpoint the OAuth provider redirects to. Accepts GET (query string)
 * and POST (form or JSON body), merges every parameter into one payload,
 * extracts the code and state, and hands the result to the coordinator.
 */

import { createServer, IncomingMessage, Server, ServerResponse } from 'http';
import { URL } from 'url';
import { VERSION } from '../version.js';
import { callbackLogger } from '../utils/logger.js';
import type { RelayCoordinator } from './coordinator.js';
import { DEFAULT_CODE_KEYS, extractCode, extractState } from './extractor.js';
import { MAX_CALLBACK_BODY_BYTES } from './protocol.js';
import type { CallbackPayload, DeliveryOutcome } from './types.js';

/**
 * Callback Server Options
 */
export interface CallbackServerOptions {
  coordinator: RelayCoordinator;
  /** Port to listen on; 0 picks a free port (default: 8000) */
  port?: number;
  /** Host to bind to (default: '127.0.0.1') */
  host?: string;
  /** Path the provider redirects to (default: '/oauth/callback') */
  callbackPath?: string;
  /** Candidate code parameter names in priority order */
  codeKeys?: readonly string[];
  /** Log callbacks that match no pending wait (default: true) */
  logUnmatched?: boolean;
  /** Largest accepted request body in bytes (default and upper bound: 1 MiB) */
  maxBodyBytes?: number;
}

/**
 * Health check response
 */
export interface HealthCheckResponse {
  status: 'ok';
  uptime: number;
  version: string;
  timestamp: string;
  pendingWaits: number;
}

/**
 * Request body rejected before it reached the coordinator
 */
class CallbackRequestError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = 'CallbackRequestError';
    this.statusCode = statusCode;
  }
}

// HTML Templates
const PAGE_STYLE = `
    body { font-family: system-ui, -apple-system, sans-serif; text-align: center; padding: 50px; background: #f9fafb; }
    .container { max-width: 400px; margin: 0 auto; background: white; padding: 40px; border-radius: 12px; box-shadow: 0 4px 6px rgba(0,0,0,0.1); }
    .icon { font-size: 48px; margin-bottom: 20px; }
    .success { color: #22c55e; }
    .error { color: #ef4444; }
    h1 { color: #111827; font-size: 24px; margin-bottom: 16px; }
    p { color: #6b7280; font-size: 16px; }`;

const SUCCESS_HTML = `<!DOCTYPE html>
<html lang="en">
<head>
  <title>Authorization Complete</title>
  <meta charset="utf-8">
  <style>${PAGE_STYLE}
  </style>
</head>
<body>
  <div class="container">
    <div class="icon success">✓</div>
    <h1>Authorization Complete</h1>
    <p>You can safely close this tab now.</p>
  </div>
</body>
</html>`;

const ERROR_HTML = (title: string, message: string) => `<!DOCTYPE html>
<html lang="en">
<head>
  <title>${title}</title>
  <meta charset="utf-8">
  <style>${PAGE_STYLE}
  </style>
</head>
<body>
  <div class="container">
    <div class="icon error">✕</div>
    <h1>${title}</h1>
    <p>${message}</p>
  </div>
</body>
</html>`;

const UNMATCHED_HTML = ERROR_HTML(
  'Authorization Failed',
  'No client is waiting for this authorization. Please try again.'
);

/**
 * Normalize one JSON body value into payload form
 */
function normalizeJsonValue(value: unknown): string | string[] | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => (typeof item === 'string' ? item : JSON.stringify(item)));
  }
  return JSON.stringify(value);
}

/**
 * Collect URL-encoded parameters; repeated names become lists
 */
function collectSearchParams(params: URLSearchParams): Array<[string, string | string[]]> {
  const entries: Array<[string, string | string[]]> = [];
  for (const key of new Set(params.keys())) {
    const values = params.getAll(key);
    entries.push([key, values.length === 1 ? values[0] : values]);
  }
  return entries;
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function collectJsonObject(body: Record<string, unknown>): Array<[string, string | string[]]> {
  const entries: Array<[string, string | string[]]> = [];
  for (const [key, value] of Object.entries(body)) {
    const normalized = normalizeJsonValue(value);
    if (normalized !== undefined) {
      entries.push([key, normalized]);
    }
  }
  return entries;
}

/**
 * Parse a POST body according to its content type
 *
 * Without a recognized content type the body is tried as JSON first, then
 * as a form.
 *
 * @throws CallbackRequestError for malformed JSON bodies
 */
export function parseCallbackBody(body: string, contentType: string | undefined): Array<[string, string | string[]]> {
  if (body.trim().length === 0) {
    return [];
  }

  const type = (contentType ?? '').toLowerCase();

  if (type.includes('application/json')) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch {
      throw new CallbackRequestError(400, 'Callback body is not valid JSON');
    }
    if (!isJsonObject(parsed)) {
      throw new CallbackRequestError(400, 'Callback JSON body must be an object');
    }
    return collectJsonObject(parsed);
  }

  if (type.includes('application/x-www-form-urlencoded')) {
    return collectSearchParams(new URLSearchParams(body));
  }

  try {
    const parsed: unknown = JSON.parse(body);
    if (isJsonObject(parsed)) {
      return collectJsonObject(parsed);
    }
  } catch {
    // Not JSON, read it as a form
  }
  return collectSearchParams(new URLSearchParams(body));
}

/**
 * Merge parameter sources into one payload; later sources override earlier
 * ones and move to the end, so they also win case-insensitive lookups
 */
export function mergeCallbackPayload(...sources: Array<Array<[string, string | string[]]>>): CallbackPayload {
  const merged = new Map<string, string | string[]>();
  for (const source of sources) {
    for (const [key, value] of source) {
      merged.delete(key);
      merged.set(key, value);
    }
  }
  return Object.fromEntries(merged);
}

/**
 * OAuth Callback Server
 *
 * Binds to localhost by default; the provider's redirect reaches it through
 * the user's browser.
 */
export class CallbackServer {
  private server: Server | null = null;
  private readonly coordinator: RelayCoordinator;
  private readonly options: Required<Omit<CallbackServerOptions, 'coordinator'>>;
  private port: number | null = null;
  private startedAt: number | null = null;

  constructor(options: CallbackServerOptions) {
    this.coordinator = options.coordinator;
    this.options = {
      port: options.port ?? 8000,
      host: options.host ?? '127.0.0.1',
      callbackPath: options.callbackPath ?? '/oauth/callback',
      codeKeys: options.codeKeys ?? DEFAULT_CODE_KEYS,
      logUnmatched: options.logUnmatched ?? true,
      maxBodyBytes: Math.min(options.maxBodyBytes ?? MAX_CALLBACK_BODY_BYTES, MAX_CALLBACK_BODY_BYTES),
    };
  }

  /**
   * Start the server
   *
   * @returns Bound port and callback URL
   * @throws Error if already running or the port cannot be bound
   */
  async start(): Promise<{ port: number; callbackUrl: string }> {
    if (this.server) {
      throw new Error('Server is already running');
    }

    const server = createServer((req, res) => this.handleRequest(req, res));
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.options.port, this.options.host, () => {
        server.removeListener('error', reject);
        resolve();
      });
    });

    const address = server.address();
    const port = address !== null && typeof address === 'object' ? address.port : this.options.port;

    this.server = server;
    this.port = port;
    this.startedAt = Date.now();

    const callbackUrl = `http://${this.options.host}:${port}${this.options.callbackPath}`;
    callbackLogger.info({ port, callbackUrl }, 'OAuth callback server started');
    return { port, callbackUrl };
  }

  /**
   * Shutdown the server
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;

    await new Promise<void>((resolve) => {
      server.close(() => resolve());
      server.closeAllConnections();
    });
    this.port = null;
    this.startedAt = null;
    callbackLogger.info('OAuth callback server stopped');
  }

  isRunning(): boolean {
    return this.server !== null;
  }

  /**
   * Bound port, or null when stopped
   */
  getPort(): number | null {
    return this.port;
  }

  private handleRequest(req: IncomingMessage, res: ServerResponse): void {
    this.route(req, res).catch((error: unknown) => {
      callbackLogger.error({ err: error }, 'Failed to handle callback request');
      if (!res.headersSent) {
        res.writeHead(500, { 'Content-Type': 'text/html; charset=utf-8' });
        res.end(ERROR_HTML('Authorization Failed', 'The relay could not process this callback.'));
      } else {
        res.end();
      }
    });
  }

  private async route(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url || '/', `http://${this.options.host}:${this.port ?? this.options.port}`);
    const method = req.method || 'GET';

    if (url.pathname === '/health' && method === 'GET') {
      this.handleHealth(res);
      return;
    }

    if (url.pathname !== this.options.callbackPath) {
      res.writeHead(404, { 'Content-Type': 'text/plain' });
      res.end('Not Found');
      return;
    }

    if (method !== 'GET' && method !== 'POST') {
      res.writeHead(405, { 'Content-Type': 'text/plain', Allow: 'GET, POST' });
      res.end('Method Not Allowed');
      return;
    }

    let payload: CallbackPayload;
    try {
      const bodyEntries =
        method === 'POST' ? parseCallbackBody(await this.readBody(req), req.headers['content-type']) : [];
      payload = mergeCallbackPayload(collectSearchParams(url.searchParams), bodyEntries);
    } catch (error) {
      if (!(error instanceof CallbackRequestError)) {
        throw error;
      }
      callbackLogger.warn({ statusCode: error.statusCode }, error.message);
      res.writeHead(error.statusCode, { 'Content-Type': 'text/html; charset=utf-8' });
      res.end(ERROR_HTML('Authorization Failed', 'The callback request could not be read.'));
      return;
    }

    const outcome = this.handleCallback(payload);

    if (outcome === 'matched') {
      res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8' });
      res.end(SUCCESS_HTML);
    } else {
      res.writeHead(404, { 'Content-Type': 'text/html; charset=utf-8' });
      res.end(UNMATCHED_HTML);
    }
  }

  /**
   * Extract code and state from a merged payload and deliver it
   */
  handleCallback(payload: CallbackPayload): DeliveryOutcome {
    const state = extractState(payload);
    const code = extractCode(payload, this.options.codeKeys);
    const outcome = this.coordinator.deliver(state ?? null, payload, code);

    if (outcome === 'matched') {
      callbackLogger.info({ state: state ?? null, codeFound: code !== undefined }, 'OAuth callback delivered');
    } else if (this.options.logUnmatched) {
      callbackLogger.warn({ state: state ?? null }, 'No client waiting for OAuth callback, dropping it');
    }
    return outcome;
  }

  private handleHealth(res: ServerResponse): void {
    const body: HealthCheckResponse = {
      status: 'ok',
      uptime: this.startedAt === null ? 0 : Math.floor((Date.now() - this.startedAt) / 1000),
      version: VERSION,
      timestamp: new Date().toISOString(),
      pendingWaits: this.coordinator.size,
    };
    res.writeHead(200, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(body));
  }

  /**
   * Read request body
   * @throws CallbackRequestError if it exceeds the size limit
   */
  private readBody(req: IncomingMessage): Promise<string> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let size = 0;
      let rejected = false;

      req.on('data', (chunk: Buffer) => {
        if (rejected) {
          return;
        }
        size += chunk.length;
        if (size > this.options.maxBodyBytes) {
          rejected = true;
          reject(new CallbackRequestError(413, 'Callback body is too large'));
          return;
        }
        chunks.push(chunk);
      });
      req.on('end', () => {
        if (!rejected) {
          resolve(Buffer.concat(chunks).toString('utf8'));
        }
      });
      req.on('error', reject);
    });
  }
}
