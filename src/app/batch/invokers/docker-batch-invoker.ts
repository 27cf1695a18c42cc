/**
 * DockerBatchInvoker runs the workflow tool inside the resolved environment image.
 * Purpose: keep container concerns out of the task engine.
 * Assumptions: host paths are mounted at identical container paths, so the
 * tool command needs no rewriting.
 */

import path from "node:path";

import type { BatchJob } from "../../../core/batch-job.js";
import type { DockerConfig } from "../../../core/config.js";
import {
  EXIT_CODES,
  InvocationError,
  InvocationTimeoutError,
  UserFacingError,
  USER_FACING_ERROR_CODES,
} from "../../../core/errors.js";
import { logTaskEvent, logToolLine } from "../../../core/logger.js";
import type { ContainerBind, ContainerSpec } from "../../../docker/docker.js";
import { DockerManager } from "../../../docker/manager.js";

import type { BatchInvocationInput, BatchInvoker } from "./batch-invoker.js";
import type { ExecutionResult } from "../types.js";

// =============================================================================
// TYPES & CONSTANTS
// =============================================================================

export type DockerBatchInvokerOptions = {
  docker?: DockerConfig;
  dockerManager?: DockerManager;
};

const LABEL_PREFIX = "msbatch";
const CONTAINER_NAME_LIMIT = 120;

// =============================================================================
// RUNNER
// =============================================================================

export class DockerBatchInvoker implements BatchInvoker {
  readonly runtime = "docker";
  private readonly manager: DockerManager;
  private readonly docker?: DockerConfig;

  constructor(opts: DockerBatchInvokerOptions = {}) {
    this.manager = opts.dockerManager ?? new DockerManager();
    this.docker = opts.docker;
  }

  async invoke(input: BatchInvocationInput): Promise<ExecutionResult> {
    const { job, environment, logger } = input;

    if (!(await this.manager.imageExists(environment))) {
      throw createImageMissingError(environment);
    }

    const containerName = buildBatchContainerName(job, input.runId);
    const existing = await this.manager.findContainerByName(containerName);
    if (existing) {
      await this.manager.removeContainer(existing);
    }

    const spec = buildContainerSpec({
      name: containerName,
      image: environment,
      job,
      cmd: [input.command.executable, ...input.command.args],
      runId: input.runId,
      docker: this.docker,
    });

    logTaskEvent(logger, "invocation.docker.start", {
      container: containerName,
      image: environment,
      binds: spec.binds.map((b) => `${b.hostPath}:${b.mode}`),
    });

    const startedAt = Date.now();
    const result = await this.manager.runContainer({
      spec,
      timeoutMs: input.timeoutSeconds !== undefined ? input.timeoutSeconds * 1000 : undefined,
      onStderrLine: (line) => logToolLine(logger, line, "stderr"),
    });
    const durationMs = Date.now() - startedAt;

    if (result.timedOut) {
      throw createTimeoutError(environment, input.timeoutSeconds ?? 0);
    }

    logTaskEvent(logger, "invocation.docker.exit", {
      container_id: result.containerId,
      status: result.status,
    });

    return { stdout: result.stdout, exitCode: result.exitCode, durationMs };
  }
}

// =============================================================================
// CONTAINER SPEC
// =============================================================================

export function buildContainerSpec(args: {
  name: string;
  image: string;
  job: BatchJob;
  cmd: string[];
  runId: string;
  docker?: DockerConfig;
}): ContainerSpec {
  const { job, docker } = args;

  return {
    name: args.name,
    image: args.image,
    env: {},
    binds: buildBinds(job),
    workdir: job.outputDir,
    cmd: args.cmd,
    user: docker?.user,
    networkMode: docker?.network_mode,
    labels: {
      [`${LABEL_PREFIX}.run_id`]: args.runId,
      [`${LABEL_PREFIX}.variant`]: job.variant,
    },
    resources: {
      memoryBytes: docker?.memory_bytes,
      cpuQuota: docker?.cpu_quota,
      pidsLimit: docker?.pids_limit,
    },
  };
}

// Every directory the tool reads is mounted read-only at its host path; the
// output directory is the only writable mount.
export function buildBinds(job: BatchJob): ContainerBind[] {
  const readOnly = [
    ...job.inputs.map((p) => path.dirname(p)),
    path.dirname(job.paramsFile),
    ...job.references.map((ref) => path.dirname(ref.path)),
  ];

  const binds = new Map<string, ContainerBind>();
  for (const dir of readOnly) {
    if (dir === job.outputDir) continue;
    binds.set(dir, { hostPath: dir, containerPath: dir, mode: "ro" });
  }
  binds.set(job.outputDir, { hostPath: job.outputDir, containerPath: job.outputDir, mode: "rw" });

  return Array.from(binds.values()).sort((a, b) => a.containerPath.localeCompare(b.containerPath));
}

export function buildBatchContainerName(job: BatchJob, runId: string): string {
  const raw = `${LABEL_PREFIX}-${job.variant}-${runId}`;
  return raw.replace(/[^a-zA-Z0-9_.-]/g, "-").slice(0, CONTAINER_NAME_LIMIT);
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

function createImageMissingError(image: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.invocation,
    title: "Environment image not found.",
    message: `Docker image ${image} is not available locally.`,
    hint: `Pull it first (docker pull ${image}) or pass --environment <image>.`,
    cause: new InvocationError(`Docker image not found: ${image}`),
    exitCode: EXIT_CODES.notResolvable,
  });
}

function createTimeoutError(image: string, timeoutSeconds: number): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.timeout,
    title: "Workflow tool timed out.",
    message: `The ${image} container did not finish within ${timeoutSeconds}s and was killed.`,
    hint: "Raise timeout_seconds (or --timeout) if the batch legitimately needs longer.",
    cause: new InvocationTimeoutError(`Timed out after ${timeoutSeconds}s`, timeoutSeconds),
    exitCode: EXIT_CODES.timeout,
  });
}
