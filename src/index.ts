#!/usr/bin/env node
import fs from "node:fs";
import { pathToFileURL } from "node:url";

import { CommanderError, type Command } from "commander";

import { renderCliError } from "./cli/render.js";
import { buildCli } from "./cli/index.js";
import { EXIT_CODES, UserFacingError, USER_FACING_ERROR_CODES } from "./core/errors.js";
import { resolveDebugFlagFromArgv } from "./core/logger.js";

// =============================================================================
// ERROR HANDLING
// =============================================================================

function configureCliErrorHandling(program: Command): void {
  program.configureOutput({
    outputError: (_message: string, _write: (chunk: string) => void) => undefined,
  });

  program.exitOverride();
  for (const command of program.commands) {
    configureCliErrorHandling(command);
  }
}

function isHelpOrVersionExit(error: unknown): boolean {
  if (!(error instanceof CommanderError)) {
    return false;
  }

  return (
    error.code === "commander.helpDisplayed" ||
    error.code === "commander.version" ||
    error.code === "commander.help"
  );
}

function resolveDebugEnabled(argv: string[], program: Command): boolean {
  const argvDebug = resolveDebugFlagFromArgv(argv);
  if (argvDebug !== undefined) {
    return argvDebug;
  }

  return Boolean(program.opts<{ debug?: boolean }>().debug);
}

function resolveExitCode(error: unknown): number {
  if (error && typeof error === "object" && "exitCode" in error) {
    const exitCode = error.exitCode;
    if (typeof exitCode === "number" && Number.isFinite(exitCode)) {
      return exitCode;
    }
  }

  return 1;
}

// Commander reports bad flags and missing arguments itself; render them like
// any other usage error.
function normalizeCommanderError(error: unknown): unknown {
  if (!(error instanceof CommanderError)) {
    return error;
  }

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.input,
    title: "Invalid command usage.",
    message: error.message.replace(/^error: /, ""),
    hint: "Run `msbatch --help` for usage.",
    cause: error,
    exitCode: EXIT_CODES.usage,
  });
}

export async function main(argv: string[]): Promise<void> {
  const program = buildCli();
  configureCliErrorHandling(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (isHelpOrVersionExit(error)) {
      process.exitCode = resolveExitCode(error);
      return;
    }

    const normalized = normalizeCommanderError(error);
    const debug = resolveDebugEnabled(argv, program);
    console.error(renderCliError(normalized, { debug }));
    const exitCode = resolveExitCode(normalized);
    process.exitCode = exitCode === 0 ? 1 : exitCode;
  }
}

// =============================================================================
// DIRECT EXECUTION
// =============================================================================

function isDirectExecution(entry: string | undefined): boolean {
  if (!entry) return false;
  // npm links the bin, so compare against the resolved target.
  return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
}

if (isDirectExecution(process.argv[1])) {
  void main(process.argv);
}
