import path from "node:path";

import type { BatchJob } from "../../core/batch-job.js";
import { BatchJobError } from "../../core/errors.js";
import { pathExists } from "../../core/utils.js";
import type { VariantSpec } from "../../core/variants.js";

/**
 * Pre-dispatch checks mirroring the workflow's own parameter validation, so a
 * bad path fails before a container is started. Collects every problem.
 */
export async function checkJobInputs(job: BatchJob, spec: VariantSpec): Promise<void> {
  const problems: string[] = [];

  if (!(await pathExists(job.paramsFile))) {
    problems.push(`Parameter file not found: ${job.paramsFile}`);
  }

  for (const ref of job.references) {
    if (!(await pathExists(ref.path))) {
      problems.push(`Reference file (${ref.kind}) not found: ${ref.path}`);
    }
  }

  const allowed = spec.inputExtensions.map((ext) => ext.toLowerCase());
  for (const input of job.inputs) {
    if (!(await pathExists(input))) {
      problems.push(`Input file not found: ${input}`);
    }
    if (!allowed.includes(path.extname(input).toLowerCase())) {
      problems.push(`Input file ${input} is not one of ${spec.inputExtensions.join(", ")}`);
    }
  }

  if (problems.length > 0) {
    throw new BatchJobError(
      `Batch job for ${job.variant} has ${problems.length} invalid input(s).`,
      problems,
    );
  }
}
