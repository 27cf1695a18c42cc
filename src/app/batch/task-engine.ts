/**
 * TaskEngine runs one workflow task from job to outcome.
 * Purpose: resolve the environment, invoke the tool once, verify the output
 * directory, arbitrate the final status and collect artifacts.
 * Assumptions: the job is valid (createBatchJob); invocation failures are fatal
 * and skip verification.
 * Usage: const outcome = await runBatchTask({ job, config, invoker });
 */

import path from "node:path";

import type { BatchJob } from "../../core/batch-job.js";
import type { BatchConfig, Runtime } from "../../core/config.js";
import { buildEnvironmentTable, resolveVariantSpec } from "../../core/config.js";
import { formatErrorMessage } from "../../core/error-format.js";
import { JsonlLogger, logTaskEvent, saveLogFile } from "../../core/logger.js";
import { defaultRunId, ensureDir } from "../../core/utils.js";

import { arbitrate, BatchTaskStateMachine } from "./arbiter.js";
import { collectOutputs } from "./collector.js";
import { resolveEnvironment } from "./environment.js";
import { checkJobInputs } from "./input-checks.js";
import type { BatchInvoker } from "./invokers/batch-invoker.js";
import { DockerBatchInvoker } from "./invokers/docker-batch-invoker.js";
import { LocalBatchInvoker } from "./invokers/local-batch-invoker.js";
import { buildToolCommand, formatToolCommand } from "./tool-command.js";
import type { ExecutionResult, TaskOutcome } from "./types.js";
import { diagnoseLayout, readOutputLayout, verify } from "./verifier.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunBatchTaskInput = {
  job: BatchJob;
  config: BatchConfig;
  invoker: BatchInvoker;
  runId?: string;
  environmentOverride?: string;
  // Overrides `timeout_seconds` from the config.
  timeoutSeconds?: number;
  checkInputs?: boolean;
};

export const EVENTS_FILE = "events.jsonl";
export const TOOL_STDOUT_FILE = "tool-stdout.log";

// =============================================================================
// ENGINE
// =============================================================================

export async function runBatchTask(input: RunBatchTaskInput): Promise<TaskOutcome> {
  const { job, config, invoker } = input;
  const runId = input.runId ?? defaultRunId();
  const spec = resolveVariantSpec(config, job.variant);
  const command = buildToolCommand(job, spec, config.executable);

  if (input.checkInputs ?? true) {
    await checkJobInputs(job, spec);
  }

  const runLogsDir = taskLogsDir(config, runId);
  const logger = new JsonlLogger(path.join(runLogsDir, EVENTS_FILE), {
    runId,
    variant: job.variant,
  });

  try {
    logTaskEvent(logger, "task.start", {
      inputs: [...job.inputs],
      output_dir: job.outputDir,
      params_file: job.paramsFile,
      workers: job.workers,
      runtime: invoker.runtime,
    });

    const { environment, source } = resolveEnvironment(
      job.variant,
      input.environmentOverride,
      buildEnvironmentTable(config),
    );
    logTaskEvent(logger, "environment.resolved", { environment, source });

    await ensureDir(job.outputDir);
    const machine = new BatchTaskStateMachine();

    logTaskEvent(logger, "invocation.start", {
      command: formatToolCommand(command),
      environment,
    });

    let execution: ExecutionResult;
    try {
      execution = await invoker.invoke({
        runId,
        job,
        environment,
        command,
        timeoutSeconds: input.timeoutSeconds ?? config.timeout_seconds,
        logger,
      });
    } catch (err) {
      logTaskEvent(logger, "invocation.error", { message: formatErrorMessage(err) });
      throw err;
    }

    logTaskEvent(logger, "invocation.complete", {
      exit_code: execution.exitCode,
      duration_ms: execution.durationMs,
    });
    await saveLogFile(path.join(runLogsDir, TOOL_STDOUT_FILE), execution.stdout);
    machine.transition({ type: "process.terminated" });

    const layout = await readOutputLayout(job.outputDir, {
      artifactPattern: spec.artifactPattern,
      shortCircuit: config.verification.short_circuit,
      expectedCount: job.inputs.length,
    });
    const verdict = verify(job.inputs.length, layout);
    const diagnostics = diagnoseLayout(job.inputs, layout);

    logTaskEvent(logger, "verification.complete", {
      complete: verdict.complete,
      expected: verdict.expectedCount,
      observed: verdict.observedCount,
      missing_artifacts: verdict.subdirectoriesMissingArtifacts,
      missing_inputs: diagnostics.missingInputs,
      unexpected_subdirectories: diagnostics.unexpectedSubdirectories,
    });

    const decision = arbitrate(execution, verdict, {
      incompleteExitCode: config.verification.incomplete_exit_code,
    });
    machine.transition({ type: "verification.complete", complete: verdict.complete });

    if (decision.reason === "recovered") {
      logTaskEvent(logger, "task.status.recovered", { raw_exit_code: execution.exitCode });
    }

    const artifacts = await collectOutputs(job.outputDir);
    logTaskEvent(logger, "outputs.collected", { count: artifacts.length });

    const outcome: TaskOutcome = {
      runId,
      variant: job.variant,
      environment,
      state: decision.state,
      exitCode: decision.exitCode,
      rawExitCode: execution.exitCode,
      reason: decision.reason,
      recovered: decision.reason === "recovered",
      stdout: execution.stdout,
      verdict,
      diagnostics,
      artifacts,
    };

    logTaskEvent(logger, "task.complete", {
      state: outcome.state,
      exit_code: outcome.exitCode,
      raw_exit_code: outcome.rawExitCode,
      reason: outcome.reason,
    });

    return outcome;
  } finally {
    logger.close();
  }
}

export function taskLogsDir(config: BatchConfig, runId: string): string {
  return path.join(config.logs_dir, runId);
}

// =============================================================================
// INVOKER
// =============================================================================

export function createBatchInvoker(runtime: Runtime, config: BatchConfig): BatchInvoker {
  if (runtime === "local") {
    return new LocalBatchInvoker();
  }

  return new DockerBatchInvoker({ docker: config.docker });
}
