#!/usr/bin/env node
import fs from "node:fs";
import { pathToFileURL } from "node:url";

import { CommanderError, type Command } from "commander";

import { renderCliError, renderCliErrorJson } from "./cli/error-format.js";
import { buildCli } from "./cli/index.js";
import { readArgvFlag } from "./core/utils.js";

const PASSIVE_EXIT_CODES = new Set([
  "commander.helpDisplayed",
  "commander.help",
  "commander.version",
]);

/**
 * Runs the CLI. Failures are rendered once to stderr (as JSON under `--json`) and turned
 * into a non-zero exit code; nothing here calls process.exit.
 */
export async function main(argv: string[]): Promise<void> {
  const program = buildCli();
  routeFailuresToCaller(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError && PASSIVE_EXIT_CODES.has(error.code)) {
      process.exitCode = error.exitCode;
      return;
    }

    const flags = program.opts<{ debug?: boolean; json?: boolean }>();
    // A parse failure can happen before commander records the global flags.
    const json = readArgvFlag(argv, "json") ?? flags.json === true;
    const debug = readArgvFlag(argv, "debug") ?? flags.debug === true;

    console.error(json ? renderCliErrorJson(error) : renderCliError(error, { debug }));
    process.exitCode = failureExitCode(error);
  }
}

function routeFailuresToCaller(command: Command): void {
  command.exitOverride().configureOutput({ outputError: () => undefined });
  command.commands.forEach(routeFailuresToCaller);
}

function failureExitCode(error: unknown): number {
  if (error instanceof CommanderError && Number.isFinite(error.exitCode) && error.exitCode !== 0) {
    return error.exitCode;
  }
  return 1;
}

// npm links the bin through a symlink; compare the resolved file.
function invokedAsScript(): boolean {
  const entry = process.argv[1];
  if (!entry || !fs.existsSync(entry)) return false;
  return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
}

if (invokedAsScript()) {
  void main(process.argv);
}
