import path from "node:path";

import { DEFAULT_VARIANT_SPECS, type ReferenceKind, type WorkflowVariant } from "./variants.js";
import { BatchJobError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ReferenceFile = {
  readonly kind: ReferenceKind;
  readonly path: string;
};

export type BatchJob = {
  readonly variant: WorkflowVariant;
  readonly inputs: readonly string[];
  readonly paramsFile: string;
  readonly references: readonly ReferenceFile[];
  readonly workers: number;
  readonly outputDir: string;
};

export type BatchJobInput = {
  variant: WorkflowVariant;
  inputs: string[];
  paramsFile: string;
  references?: ReferenceFile[];
  workers?: number;
  // Used when `workers` is absent; falls back to the variant's built-in default.
  defaultWorkers?: number;
  outputDir: string;
  cwd?: string;
};

// Inputs reach the tool as one delimited argument.
export const INPUT_DELIMITER = ",";

// =============================================================================
// CONSTRUCTION
// =============================================================================

/**
 * Builds the immutable description of one task invocation.
 *
 * Paths are resolved against `cwd` so the job reads the same on the host and
 * inside a container that mounts directories at identical paths. Input order
 * and duplicates are kept as given.
 */
export function createBatchJob(input: BatchJobInput): BatchJob {
  const cwd = input.cwd ?? process.cwd();
  const problems: string[] = [];

  const inputs = input.inputs.map((p) => p.trim()).filter((p) => p.length > 0);
  if (inputs.length === 0) {
    problems.push("At least one input file is required.");
  }
  for (const p of inputs) {
    if (p.includes(INPUT_DELIMITER)) {
      problems.push(`Input path contains "${INPUT_DELIMITER}": ${p}`);
    }
  }

  const workers =
    input.workers ?? input.defaultWorkers ?? DEFAULT_VARIANT_SPECS[input.variant].defaultWorkers;
  if (!Number.isInteger(workers) || workers < 1) {
    problems.push(`Worker count must be a positive integer (received ${String(workers)}).`);
  }

  const paramsFile = input.paramsFile.trim();
  if (paramsFile.length === 0) {
    problems.push("A parameter file is required.");
  }

  const outputDir = input.outputDir.trim();
  if (outputDir.length === 0) {
    problems.push("An output directory is required.");
  }

  const references = input.references ?? [];
  const seenKinds = new Set<ReferenceKind>();
  for (const ref of references) {
    if (seenKinds.has(ref.kind)) {
      problems.push(`Reference file "${ref.kind}" was given more than once.`);
    }
    seenKinds.add(ref.kind);
  }

  if (problems.length > 0) {
    throw new BatchJobError(`Invalid batch job: ${problems.join(" ")}`, problems);
  }

  return Object.freeze({
    variant: input.variant,
    inputs: Object.freeze(inputs.map((p) => path.resolve(cwd, p))),
    paramsFile: path.resolve(cwd, paramsFile),
    references: Object.freeze(
      references.map((ref) => Object.freeze({ kind: ref.kind, path: path.resolve(cwd, ref.path) })),
    ),
    workers,
    outputDir: path.resolve(cwd, outputDir),
  });
}

export function splitInputList(raw: string): string[] {
  return raw
    .split(INPUT_DELIMITER)
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}
