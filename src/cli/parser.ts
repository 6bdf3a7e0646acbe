/**
 * CLI Parser for oauth-relay
 *
 * Parses command line arguments into a command and the settings it
 * overrides. Environment variables are read by the configuration loader.
 */

import type { RelayConfigInput } from '../config/relay-config.js';
import { SERVER_NAME, VERSION } from '../version.js';

export type CLICommand = 'serve' | 'wait';

/**
 * CLI Options interface
 */
export interface CLIOptions {
  command: CLICommand;
  /** Path to configuration file */
  config?: string;
  /** HTTP callback server port */
  port?: number;
  /** HTTP callback server host address */
  host?: string;
  /** Coordinator unix socket path */
  socket?: string;
  /** Use the loopback TCP transport instead of the unix socket */
  tcp: boolean;
  /** OAuth state to wait for (wait command) */
  state?: string;
  /** Wait timeout in seconds (wait command) */
  timeout?: number;
  /** Show help message */
  help: boolean;
  /** Show version */
  version: boolean;
  /** Set when the first positional argument is not a known command */
  error?: string;
}

const COMMANDS: ReadonlySet<string> = new Set<CLICommand>(['serve', 'wait']);

/** Minimum valid port number (0 lets the OS choose) */
const MIN_PORT = 0;

/** Maximum valid port number */
const MAX_PORT = 65535;

function isCommand(value: string): value is CLICommand {
  return COMMANDS.has(value);
}

/**
 * Get the value of an argument that takes a parameter
 * @param args - Command line arguments
 * @param longFlag - Long flag (e.g., '--port')
 * @param shortFlag - Short flag (e.g., '-p')
 * @returns The value or undefined
 */
function getArgValue(args: string[], longFlag: string, shortFlag?: string): string | undefined {
  for (const flag of shortFlag ? [longFlag, shortFlag] : [longFlag]) {
    const index = args.indexOf(flag);
    if (index !== -1 && index + 1 < args.length) {
      const value = args[index + 1];
      // Make sure it's not another flag
      if (!value.startsWith('-')) {
        return value;
      }
    }
  }
  return undefined;
}

/**
 * Check if a boolean flag is present in the arguments
 */
function hasFlag(args: string[], longFlag: string, shortFlag?: string): boolean {
  return args.includes(longFlag) || (shortFlag ? args.includes(shortFlag) : false);
}

/**
 * Parse port number from string
 * @returns Valid port number, or undefined so configuration decides
 */
function parsePort(portStr: string | undefined): number | undefined {
  if (!portStr) {
    return undefined;
  }

  const port = Number(portStr);
  if (!Number.isInteger(port) || port < MIN_PORT || port > MAX_PORT) {
    return undefined;
  }

  return port;
}

/**
 * Parse a positive number of seconds
 */
function parseSeconds(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds > 0 ? seconds : undefined;
}

/**
 * Parse command line arguments
 * @param args - Command line arguments (without node and script path)
 * @returns Parsed CLI options
 */
export function parseArgs(args: string[]): CLIOptions {
  let command: CLICommand = 'serve';
  let error: string | undefined;

  const first = args[0];
  if (first !== undefined && !first.startsWith('-')) {
    if (isCommand(first)) {
      command = first;
    } else {
      error = `Unknown command: ${first}`;
    }
  }

  return {
    command,
    config: getArgValue(args, '--config', '-c'),
    port: parsePort(getArgValue(args, '--port', '-p')),
    host: getArgValue(args, '--host', '-H'),
    socket: getArgValue(args, '--socket', '-s'),
    tcp: hasFlag(args, '--tcp'),
    state: getArgValue(args, '--state'),
    timeout: parseSeconds(getArgValue(args, '--timeout', '-t')),
    help: hasFlag(args, '--help', '-h'),
    version: hasFlag(args, '--version', '-v'),
    error,
  };
}

/**
 * Configuration overrides named on the command line
 */
export function toConfigOverrides(options: CLIOptions): RelayConfigInput {
  return {
    httpPort: options.port,
    httpHost: options.host,
    socketPath: options.socket,
    useTcp: options.tcp ? true : undefined,
  };
}

/**
 * Generate help message
 * @returns Help message string
 */
export function getHelpMessage(): string {
  return `
${SERVER_NAME} - relay OAuth authorization codes to waiting local processes

Usage:
  ${SERVER_NAME} [serve] [options]       Run the callback server and relay coordinator
  ${SERVER_NAME} wait [options]          Wait for one callback and print it as JSON

Options:
  --config, -c <path>    Path to JSON configuration file
  --port, -p <number>    HTTP callback server port (default: 8000)
  --host, -H <address>   HTTP callback server host (default: 127.0.0.1)
  --socket, -s <path>    Coordinator unix socket path
  --tcp                  Use the loopback TCP transport instead of the unix socket
  --state <value>        OAuth state to wait for (wait only; omit for single-slot mode)
  --timeout, -t <sec>    Seconds to wait for the callback (wait only; default: 300)
  --help, -h             Show this help message
  --version, -v          Show version

Environment Variables:
  OAUTH_RELAY_CONFIG_PATH              Path to JSON configuration file
  OAUTH_RELAY_CALLBACK_PATH            Callback route (default: /oauth/callback)
  OAUTH_RELAY_HTTP_HOST                HTTP callback server host
  OAUTH_RELAY_HTTP_PORT                HTTP callback server port
  OAUTH_RELAY_CODE_KEYS                Comma-separated code parameter names
  OAUTH_RELAY_SOCKET_PATH              Coordinator unix socket path
  OAUTH_RELAY_TCP_HOST                 TCP transport host (default: 127.0.0.1)
  OAUTH_RELAY_TCP_PORT                 TCP transport port (default: 9999)
  OAUTH_RELAY_USE_TCP                  Set to 'true' to force the TCP transport
  OAUTH_RELAY_DEFAULT_TIMEOUT_MS       Default wait timeout in milliseconds
  OAUTH_RELAY_LOG_UNMATCHED            Log callbacks nobody waits for (default: true)
  OAUTH_RELAY_REGISTRATION_TIMEOUT_MS  Time a consumer has to register after connecting
  LOG_LEVEL                            trace, debug, info, warn, error, fatal or silent

Examples:
  ${SERVER_NAME}                                  # Serve on 127.0.0.1:8000
  ${SERVER_NAME} serve --port 8080 --tcp          # Custom port, TCP transport
  ${SERVER_NAME} wait --state abc123 --timeout 60 # Wait up to a minute for state abc123
`.trim();
}

/**
 * Get version string
 * @returns Version string
 */
export function getVersion(): string {
  return VERSION;
}
