/**
 * LocalBatchInvoker runs the workflow tool directly on the host.
 * Purpose: development runs and hosts where the toolchain is installed natively.
 * Assumptions: the environment identifier is informational only here.
 * Usage: new LocalBatchInvoker().invoke(...)
 */

import os from "node:os";

import { ExecaError, execa } from "execa";

import {
  EXIT_CODES,
  InvocationError,
  InvocationTimeoutError,
  UserFacingError,
  USER_FACING_ERROR_CODES,
} from "../../../core/errors.js";
import { logTaskEvent, logToolLine } from "../../../core/logger.js";

import type { BatchInvocationInput, BatchInvoker } from "./batch-invoker.js";
import type { ExecutionResult } from "../types.js";

// =============================================================================
// RUNNER
// =============================================================================

export class LocalBatchInvoker implements BatchInvoker {
  readonly runtime = "local";

  async invoke(input: BatchInvocationInput): Promise<ExecutionResult> {
    const { command, job, logger } = input;

    logTaskEvent(logger, "invocation.local.start", {
      executable: command.executable,
      environment: input.environment,
    });

    const startedAt = Date.now();
    const result = await execa(command.executable, command.args, {
      cwd: job.outputDir,
      reject: false,
      stdin: "ignore",
      stripFinalNewline: false,
      timeout: input.timeoutSeconds !== undefined ? input.timeoutSeconds * 1000 : undefined,
    });
    const durationMs = Date.now() - startedAt;

    for (const line of result.stderr.split("\n")) {
      const trimmed = line.trimEnd();
      if (trimmed.length > 0) logToolLine(logger, trimmed, "stderr");
    }

    if (result.timedOut) {
      throw createTimeoutError(command.executable, input.timeoutSeconds ?? 0, result);
    }

    const exitCode = result.exitCode ?? signalExitCode(result.signal);
    if (exitCode === undefined) {
      throw createNotResolvableError(command.executable, result);
    }

    return { stdout: result.stdout, exitCode, durationMs };
  }
}

// =============================================================================
// STATUS HELPERS
// =============================================================================

// Shell convention: a process killed by signal N reports 128 + N.
export function signalExitCode(signal: string | undefined): number | undefined {
  if (!signal) return undefined;
  const entry = Object.entries(os.constants.signals).find(([name]) => name === signal);
  return entry ? 128 + entry[1] : undefined;
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

function createNotResolvableError(executable: string, cause: unknown): UserFacingError {
  const detail = cause instanceof ExecaError ? cause.shortMessage : String(cause);
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.invocation,
    title: "Workflow tool could not be started.",
    message: `Unable to run "${executable}" on this host.`,
    hint: "Install the workflow toolchain, set `executable` in the config, or use --runtime docker.",
    cause: new InvocationError(detail, cause),
    exitCode: EXIT_CODES.notResolvable,
  });
}

function createTimeoutError(
  executable: string,
  timeoutSeconds: number,
  cause: unknown,
): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.timeout,
    title: "Workflow tool timed out.",
    message: `"${executable}" did not finish within ${timeoutSeconds}s and was terminated.`,
    hint: "Raise timeout_seconds (or --timeout) if the batch legitimately needs longer.",
    cause: new InvocationTimeoutError(`Timed out after ${timeoutSeconds}s`, timeoutSeconds, cause),
    exitCode: EXIT_CODES.timeout,
  });
}
