#!/usr/bin/env node
import fs from "node:fs";
import { pathToFileURL } from "node:url";

import { CommanderError, type Command } from "commander";

import { buildCli } from "./cli/index.js";
import { renderCliError } from "./cli/output.js";

const QUIET_COMMANDER_CODES = new Set([
  "commander.helpDisplayed",
  "commander.help",
  "commander.version",
]);

/** Runs the CLI and resolves to its exit code; errors are rendered on stderr, never thrown. */
export async function main(argv: string[]): Promise<number> {
  const program = buildCli();
  routeCommanderErrors(program);

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError && QUIET_COMMANDER_CODES.has(error.code)) {
      return error.exitCode;
    }

    console.error(renderCliError(error, { debug: isDebugRequested(argv) }));
    return error instanceof CommanderError && error.exitCode !== 0 ? error.exitCode : 1;
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function routeCommanderErrors(program: Command): void {
  // Subcommands copy these settings only when created, so apply them to each one.
  for (const command of [program, ...program.commands]) {
    command.configureOutput({ outputError: () => undefined });
    command.exitOverride();
  }
}

// Read from argv so a failure while parsing options still honours --debug.
function isDebugRequested(argv: string[]): boolean {
  const end = argv.indexOf("--");
  return (end === -1 ? argv : argv.slice(0, end)).includes("--debug");
}

// =============================================================================
// DIRECT EXECUTION
// =============================================================================

function isDirectExecution(): boolean {
  const entryPath = process.argv[1];
  if (!entryPath || !fs.existsSync(entryPath)) return false;

  // npm links the bin, so compare against the resolved target.
  return import.meta.url === pathToFileURL(fs.realpathSync(entryPath)).href;
}

if (isDirectExecution()) {
  void main(process.argv).then((exitCode) => {
    process.exitCode = exitCode;
  });
}
