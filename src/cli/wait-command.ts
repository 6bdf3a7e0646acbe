/**
 * `oauth-relay wait`: block until one callback is relayed and print it
 */

import { loadRelayConfig, resolveEndpoint } from '../config/relay-config.js';
import { waitForCode } from '../relay/client.js';
import {
  OAuthConnectionError,
  OAuthSupersededError,
  OAuthTimeoutError,
} from '../types/errors.js';
import { cliLogger } from '../utils/logger.js';
import { CLIOptions, toConfigOverrides } from './parser.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
  TIMEOUT: 2,
  SUPERSEDED: 3,
  CONNECTION: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface WaitCommandResult {
  exitCode: ExitCode;
  /** Result JSON for stdout */
  output?: string;
  /** Message for stderr */
  error?: string;
}

export interface WaitCommandOptions {
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
}

/**
 * Map a failed wait to the process exit code
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof OAuthTimeoutError) {
    return EXIT_CODES.TIMEOUT;
  }
  if (error instanceof OAuthSupersededError) {
    return EXIT_CODES.SUPERSEDED;
  }
  if (error instanceof OAuthConnectionError) {
    return EXIT_CODES.CONNECTION;
  }
  return EXIT_CODES.FAILURE;
}

/**
 * Run the wait command
 *
 * A callback without a code still exits 0: the raw payload is printed so the
 * caller can inspect provider errors such as `error=access_denied`.
 */
export async function runWaitCommand(
  options: CLIOptions,
  waitOptions: WaitCommandOptions = {}
): Promise<WaitCommandResult> {
  try {
    const config = await loadRelayConfig({
      configPath: options.config,
      env: waitOptions.env,
      overrides: toConfigOverrides(options),
    });
    const state = options.state ?? null;

    const result = await waitForCode(state, {
      endpoint: resolveEndpoint(config),
      timeoutMs: options.timeout !== undefined ? options.timeout * 1000 : config.defaultTimeoutMs,
      signal: waitOptions.signal,
      onRegistered: () => {
        cliLogger.info({ state }, 'Waiting for OAuth callback');
      },
    });

    return { exitCode: EXIT_CODES.SUCCESS, output: JSON.stringify(result) };
  } catch (error) {
    return {
      exitCode: exitCodeFor(error),
      error: error instanceof Error ? error.message : 'Unknown error',
    };
  }
}
