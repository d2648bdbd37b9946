#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { CommanderError, type Command } from "commander";

import { renderCliError } from "./cli/error-format.js";
import { buildCli } from "./cli/index.js";

// =============================================================================
// ERROR HANDLING
// =============================================================================

function configureCliErrorHandling(program: Command): void {
  program.exitOverride();
  for (const command of program.commands) {
    command.exitOverride();
    for (const sub of command.commands) {
      sub.exitOverride();
    }
  }
}

function isHelpOrVersionExit(error: unknown): error is CommanderError {
  return (
    error instanceof CommanderError &&
    (error.code === "commander.helpDisplayed" ||
      error.code === "commander.version" ||
      error.code === "commander.help")
  );
}

function resolveDebugFlagFromArgv(argv: string[]): boolean {
  let debug = false;
  for (const arg of argv) {
    if (arg === "--") break;
    if (arg === "--debug") debug = true;
    if (arg === "--no-debug") debug = false;
  }
  return debug;
}

export async function main(argv: string[]): Promise<void> {
  const program = buildCli();
  configureCliErrorHandling(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (isHelpOrVersionExit(error)) {
      process.exitCode = error.exitCode;
      return;
    }
    // Commander already printed its own usage error.
    if (error instanceof CommanderError) {
      process.exitCode = error.exitCode === 0 ? 1 : error.exitCode;
      return;
    }

    console.error(renderCliError(error, { debug: resolveDebugFlagFromArgv(argv) }));
    process.exitCode = 1;
  }
}

// =============================================================================
// DIRECT EXECUTION
// =============================================================================

function isDirectExecution(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isDirectExecution()) {
  void main(process.argv);
}
