/**
 * Main Entry Point for oauth-relay
 *
 * Handles server startup based on CLI options.
 */

import { loadRelayConfig, resolveEndpoint, type RelayConfig } from '../config/relay-config.js';
import { CallbackServer } from '../relay/callback-server.js';
import { RelayCoordinator } from '../relay/coordinator.js';
import { RelayTransportServer } from '../relay/transport.js';
import { describeEndpoint, type RelayEndpoint } from '../relay/types.js';
import { toRelayErrorInfo } from '../types/errors.js';
import { cliLogger } from '../utils/logger.js';
import { CLIOptions, getHelpMessage, getVersion, toConfigOverrides } from './parser.js';

/**
 * Server mode type
 */
export type ServerMode = 'serve' | 'help' | 'version';

/**
 * Server start result
 */
export interface ServerStartResult {
  /** Server mode */
  mode: ServerMode;
  /** Whether startup was successful */
  success: boolean;
  /** Error message if failed */
  error?: string;
  /** Message for help/version modes */
  message?: string;
  /** URL the OAuth provider should redirect to */
  callbackUrl?: string;
  /** Endpoint consumers connect to */
  endpoint?: RelayEndpoint;
  /** Stop function for the running relay */
  stop?: () => Promise<void>;
}

/**
 * A running relay: coordinator, consumer transport and HTTP ingress
 */
export interface RelayServer {
  config: RelayConfig;
  coordinator: RelayCoordinator;
  transport: RelayTransportServer;
  callbackServer: CallbackServer;
  callbackUrl: string;
  endpoint: RelayEndpoint;
  stop: () => Promise<void>;
}

/**
 * Start the relay from a validated configuration
 *
 * The transport is bound first so consumers can register before the first
 * callback can arrive.
 */
export async function startRelayServer(config: RelayConfig): Promise<RelayServer> {
  const coordinator = new RelayCoordinator({ defaultTimeoutMs: config.defaultTimeoutMs });
  const transport = new RelayTransportServer({
    coordinator,
    endpoint: resolveEndpoint(config),
    registrationTimeoutMs: config.registrationTimeoutMs,
  });
  const callbackServer = new CallbackServer({
    coordinator,
    port: config.httpPort,
    host: config.httpHost,
    callbackPath: config.callbackPath,
    codeKeys: config.codeKeys,
    logUnmatched: config.logUnmatched,
  });

  const endpoint = await transport.start();
  let callbackUrl: string;
  try {
    ({ callbackUrl } = await callbackServer.start());
  } catch (error) {
    coordinator.stop();
    await transport.stop();
    throw error;
  }

  let stopping: Promise<void> | null = null;
  const stop = (): Promise<void> => {
    if (!stopping) {
      stopping = (async () => {
        await callbackServer.stop();
        coordinator.stop();
        await transport.stop();
      })();
    }
    return stopping;
  };

  cliLogger.info({ callbackUrl, endpoint: describeEndpoint(endpoint) }, 'OAuth relay ready');

  return { config, coordinator, transport, callbackServer, callbackUrl, endpoint, stop };
}

/**
 * Start the server based on CLI options
 * @param options - Parsed CLI options
 * @param env - Environment to read settings from (default: process.env)
 * @returns Server start result
 */
export async function startServer(options: CLIOptions, env?: NodeJS.ProcessEnv): Promise<ServerStartResult> {
  // Handle help
  if (options.help) {
    return {
      mode: 'help',
      success: true,
      message: getHelpMessage(),
    };
  }

  // Handle version
  if (options.version) {
    return {
      mode: 'version',
      success: true,
      message: getVersion(),
    };
  }

  try {
    const config = await loadRelayConfig({
      configPath: options.config,
      env,
      overrides: toConfigOverrides(options),
    });
    const server = await startRelayServer(config);

    return {
      mode: 'serve',
      success: true,
      callbackUrl: server.callbackUrl,
      endpoint: server.endpoint,
      stop: server.stop,
    };
  } catch (error) {
    cliLogger.error({ error: toRelayErrorInfo(error, 'starting relay') }, 'Failed to start relay');
    return {
      mode: 'serve',
      success: false,
      error: error instanceof Error ? error.message : 'Unknown error',
    };
  }
}
