import type { Command } from "commander";

import { closeAppContext, type AppContext } from "../app/context.js";
import { loadAppContext } from "../app/config/load-app-context.js";

import type { OutputOptions } from "./output.js";

// =============================================================================
// GLOBAL OPTIONS
// =============================================================================

export type GlobalCliOptions = {
  config?: string;
  json?: boolean;
  debug?: boolean;
};

export function readGlobalOptions(command: Command): GlobalCliOptions {
  return command.optsWithGlobals<GlobalCliOptions>();
}

export function outputOptionsFor(command: Command): OutputOptions {
  return { json: readGlobalOptions(command).json === true };
}

// =============================================================================
// CONTEXT LIFETIME
// =============================================================================

/**
 * Opens the app context for one command invocation and always closes it, so the SQLite
 * handle and the event log file are released even when the handler throws.
 */
export async function withAppContext<T>(
  command: Command,
  handler: (ctx: AppContext, output: OutputOptions) => Promise<T> | T,
): Promise<T> {
  const globals = readGlobalOptions(command);
  const ctx = loadAppContext({ explicitConfigPath: globals.config });
  try {
    return await handler(ctx, { json: globals.json === true });
  } finally {
    closeAppContext(ctx);
  }
}
