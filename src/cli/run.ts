import { createBatchInvoker, runBatchTask } from "../app/batch/task-engine.js";
import type { BatchInvoker } from "../app/batch/invokers/batch-invoker.js";
import type { TaskOutcome } from "../app/batch/types.js";
import { createBatchJob, type ReferenceFile } from "../core/batch-job.js";
import { resolveVariantSpec, type BatchConfig, type Runtime } from "../core/config.js";
import { formatErrorMessage } from "../core/error-format.js";
import {
  BatchJobError,
  ConfigError,
  DockerError,
  EXIT_CODES,
  InvocationError,
  InvocationTimeoutError,
  type UserFacingErrorCode,
  UserFacingError,
  USER_FACING_ERROR_CODES,
} from "../core/errors.js";
import { parseWorkflowVariant, WORKFLOW_VARIANTS, type WorkflowVariant } from "../core/variants.js";

import { renderRunSummary } from "./render.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunCommandOptions = {
  inputs: string[];
  outputDir: string;
  params: string;
  spectralDb?: string;
  scanTranslator?: string;
  calibration?: string;
  metabrefToken?: string;
  nmdcMetadata?: string;
  workers?: number;
  environment?: string;
  runtime?: Runtime;
  timeout?: number;
  runId?: string;
  checkInputs?: boolean;
  json?: boolean;
};

export type RunCommandDeps = {
  invoker?: BatchInvoker;
  cwd?: string;
};

// =============================================================================
// COMMAND
// =============================================================================

export async function runCommand(
  variantName: string,
  config: BatchConfig,
  opts: RunCommandOptions,
  deps: RunCommandDeps = {},
): Promise<TaskOutcome> {
  try {
    const variant = resolveVariantArg(variantName);
    const job = createBatchJob({
      variant,
      inputs: opts.inputs,
      paramsFile: opts.params,
      references: collectReferences(opts),
      workers: opts.workers,
      defaultWorkers: resolveVariantSpec(config, variant).defaultWorkers,
      outputDir: opts.outputDir,
      cwd: deps.cwd,
    });

    const runtime = opts.runtime ?? config.runtime;
    const outcome = await runBatchTask({
      job,
      config,
      invoker: deps.invoker ?? createBatchInvoker(runtime, config),
      runId: opts.runId,
      environmentOverride: opts.environment,
      timeoutSeconds: opts.timeout,
      checkInputs: opts.checkInputs,
    });

    printOutcome(outcome, opts.json ?? false);
    process.exitCode = outcome.exitCode;
    return outcome;
  } catch (error) {
    throw normalizeRunCommandError(error);
  }
}

function collectReferences(opts: RunCommandOptions): ReferenceFile[] {
  const references: ReferenceFile[] = [];
  if (opts.spectralDb) references.push({ kind: "spectral_database", path: opts.spectralDb });
  if (opts.scanTranslator) references.push({ kind: "scan_translator", path: opts.scanTranslator });
  if (opts.calibration) references.push({ kind: "calibration", path: opts.calibration });
  if (opts.metabrefToken) references.push({ kind: "metabref_token", path: opts.metabrefToken });
  if (opts.nmdcMetadata) references.push({ kind: "nmdc_metadata", path: opts.nmdcMetadata });
  return references;
}

function resolveVariantArg(raw: string): WorkflowVariant {
  const variant = parseWorkflowVariant(raw);
  if (variant) return variant;

  throw new UserFacingError({
    code: USER_FACING_ERROR_CODES.input,
    title: "Unknown workflow variant.",
    message: `"${raw}" is not a workflow variant.`,
    hint: `Use one of: ${WORKFLOW_VARIANTS.join(", ")}.`,
    exitCode: EXIT_CODES.usage,
  });
}

// =============================================================================
// OUTPUT
// =============================================================================

function printOutcome(outcome: TaskOutcome, json: boolean): void {
  if (json) {
    console.log(JSON.stringify(outcome, null, 2));
    return;
  }

  if (outcome.stdout.length > 0) {
    process.stdout.write(outcome.stdout.endsWith("\n") ? outcome.stdout : `${outcome.stdout}\n`);
  }

  console.log(renderRunSummary(outcome));

  for (const input of outcome.diagnostics.missingInputs) {
    console.log(`  missing result: ${input}`);
  }
  for (const name of outcome.verdict.subdirectoriesMissingArtifacts) {
    console.log(`  no artifact in: ${name}`);
  }
  for (const artifact of outcome.artifacts) {
    console.log(artifact);
  }
}

// =============================================================================
// ERROR NORMALIZATION
// =============================================================================

const RUN_COMMAND_FAILURE_TITLE = "Run command failed.";
const RUN_COMMAND_INPUT_HINT = "Fix the listed inputs, or pass --no-check-inputs to skip the checks.";

function normalizeRunCommandError(error: unknown): UserFacingError {
  if (error instanceof UserFacingError) {
    return error;
  }

  if (error instanceof BatchJobError) {
    const message =
      error.problems.length > 0
        ? [error.message, ...error.problems.map((p) => `- ${p}`)].join("\n")
        : error.message;
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.input,
      title: "Invalid batch job.",
      message,
      hint: RUN_COMMAND_INPUT_HINT,
      cause: error,
      exitCode: EXIT_CODES.usage,
    });
  }

  return new UserFacingError({
    code: resolveCommandErrorCode(error),
    title: RUN_COMMAND_FAILURE_TITLE,
    message: formatErrorMessage(error),
    cause: error,
    exitCode: resolveCommandExitCode(error),
  });
}

function resolveCommandErrorCode(error: unknown): UserFacingErrorCode {
  if (error instanceof ConfigError) {
    return USER_FACING_ERROR_CODES.config;
  }
  if (error instanceof InvocationTimeoutError) {
    return USER_FACING_ERROR_CODES.timeout;
  }
  if (error instanceof InvocationError) {
    return USER_FACING_ERROR_CODES.invocation;
  }
  if (error instanceof DockerError) {
    return USER_FACING_ERROR_CODES.docker;
  }

  return USER_FACING_ERROR_CODES.unknown;
}

function resolveCommandExitCode(error: unknown): number | undefined {
  if (error instanceof ConfigError) return EXIT_CODES.usage;
  if (error instanceof InvocationTimeoutError) return EXIT_CODES.timeout;
  if (error instanceof InvocationError) return EXIT_CODES.notResolvable;
  return undefined;
}
