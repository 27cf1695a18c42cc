/**
 * BatchInvoker runs the external workflow tool once over a whole batch.
 * Purpose: hide whether the tool runs in a container or on the host.
 * Assumptions: the task engine has validated the job and resolved the environment.
 * Usage: const result = await invoker.invoke({ job, environment, command, runId, logger })
 */

import type { BatchJob } from "../../../core/batch-job.js";
import type { JsonlLogger } from "../../../core/logger.js";
import type { ToolCommand } from "../tool-command.js";
import type { ExecutionResult } from "../types.js";

export type BatchInvocationInput = {
  runId: string;
  job: BatchJob;
  environment: string;
  command: ToolCommand;
  timeoutSeconds?: number;
  logger: JsonlLogger;
};

export type BatchInvoker = {
  readonly runtime: string;
  // Resolves once the process has terminated, whatever its status. Throws
  // InvocationError when the tool cannot be started and
  // InvocationTimeoutError when it outlives the timeout.
  invoke(input: BatchInvocationInput): Promise<ExecutionResult>;
};
