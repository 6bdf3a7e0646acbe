#!/usr/bin/env node
/**
 * oauth-relay - OAuth callback relay for local processes
 *
 * Receives OAuth redirects on a local HTTP endpoint and hands the
 * authorization code to whichever local process registered for its state.
 */

import { parseArgs, getHelpMessage } from "./cli/parser.js";
import { startServer } from "./cli/main-entry.js";
import { runWaitCommand } from "./cli/wait-command.js";
import { setupSignalHandlers } from "./cli/signal-handler.js";
import { SERVER_NAME, VERSION } from "./version.js";

async function main(): Promise<void> {
  // Parse CLI arguments
  const options = parseArgs(process.argv.slice(2));

  if (options.error) {
    console.error(options.error);
    console.error(getHelpMessage());
    process.exit(1);
  }

  // Handle help and version
  if (options.help || options.version) {
    const result = await startServer(options);
    console.log(result.message);
    process.exit(0);
  }

  if (options.command === "wait") {
    const controller = new AbortController();
    const abort = (): void => controller.abort();
    process.once("SIGINT", abort);
    process.once("SIGTERM", abort);

    const result = await runWaitCommand(options, { signal: controller.signal });
    if (result.output !== undefined) {
      console.log(result.output);
    }
    if (result.error !== undefined) {
      console.error(result.error);
    }
    process.exit(result.exitCode);
  }

  const result = await startServer(options);

  if (!result.success || !result.stop) {
    console.error(`Failed to start relay: ${result.error}`);
    process.exit(1);
  }

  console.error(`${SERVER_NAME} v${VERSION} listening for callbacks at ${result.callbackUrl}`);

  // Keep the process running until a shutdown signal
  setupSignalHandlers(result.stop);
}

main().catch((error) => {
  console.error("Failed to start oauth-relay:", error);
  process.exit(1);
});
