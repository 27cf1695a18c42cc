import path from "node:path";

import type { LayoutDiagnostics, VerificationVerdict } from "../app/batch/types.js";
import { diagnoseLayout, readOutputLayout, verify } from "../app/batch/verifier.js";
import { splitInputList } from "../core/batch-job.js";
import type { BatchConfig } from "../core/config.js";
import { EXIT_CODES, UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { DEFAULT_ARTIFACT_PATTERN } from "../core/variants.js";

import { renderVerdict } from "./render.js";

// =============================================================================
// TYPES
// =============================================================================

export type VerifyCommandOptions = {
  outputDir: string;
  expected?: number;
  inputs?: string;
  pattern?: string;
  exhaustive?: boolean;
  json?: boolean;
};

export type VerifyCommandResult = {
  outputDir: string;
  verdict: VerificationVerdict;
  diagnostics: LayoutDiagnostics | null;
};

// =============================================================================
// COMMAND
// =============================================================================

/**
 * Re-runs completion verification against an existing output directory.
 * Exits 0 when complete and 1 otherwise; never touches the directory.
 */
export async function verifyCommand(
  config: BatchConfig,
  opts: VerifyCommandOptions,
  cwd: string = process.cwd(),
): Promise<VerifyCommandResult> {
  const inputs = opts.inputs !== undefined ? splitInputList(opts.inputs) : null;
  const expectedCount = resolveExpectedCount(opts.expected, inputs);
  const outputDir = path.resolve(cwd, opts.outputDir);

  const layout = await readOutputLayout(outputDir, {
    artifactPattern:
      opts.pattern ?? config.verification.artifact_pattern ?? DEFAULT_ARTIFACT_PATTERN,
    shortCircuit: opts.exhaustive ? false : config.verification.short_circuit,
    expectedCount,
  });
  const verdict = verify(expectedCount, layout);
  const diagnostics = inputs ? diagnoseLayout(inputs, layout) : null;

  const result: VerifyCommandResult = { outputDir, verdict, diagnostics };
  printVerifyResult(result, opts.json ?? false, layout.exists);
  process.exitCode = verdict.complete ? 0 : 1;
  return result;
}

function resolveExpectedCount(expected: number | undefined, inputs: string[] | null): number {
  if (expected !== undefined && inputs !== null) {
    throw createUsageError("Pass either --expected or --inputs, not both.");
  }
  if (inputs !== null) {
    return inputs.length;
  }
  if (expected === undefined) {
    throw createUsageError("One of --expected or --inputs is required.");
  }
  if (!Number.isInteger(expected) || expected < 0) {
    throw createUsageError(`--expected must be a non-negative integer (received ${expected}).`);
  }
  return expected;
}

// =============================================================================
// OUTPUT
// =============================================================================

function printVerifyResult(result: VerifyCommandResult, json: boolean, exists: boolean): void {
  if (json) {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  const { verdict } = result;
  if (!exists) {
    console.log(`Output directory ${result.outputDir} does not exist.`);
  }
  console.log(renderVerdict(verdict, result.outputDir));

  for (const name of verdict.subdirectoriesMissingArtifacts) {
    console.log(`  no artifact in: ${name}`);
  }
  for (const input of result.diagnostics?.missingInputs ?? []) {
    console.log(`  missing result: ${input}`);
  }
  for (const name of result.diagnostics?.unexpectedSubdirectories ?? []) {
    console.log(`  unexpected directory: ${name}`);
  }
}

function createUsageError(message: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.input,
    title: "Invalid verify options.",
    message,
    hint: "Example: msbatch verify --output-dir out --expected 3",
    exitCode: EXIT_CODES.usage,
  });
}
