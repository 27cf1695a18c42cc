import { resolveEnvironment, type EnvironmentResolution } from "../app/batch/environment.js";
import { buildEnvironmentTable, type BatchConfig } from "../core/config.js";
import { WORKFLOW_VARIANTS, type WorkflowVariant } from "../core/variants.js";

export type EnvironmentRow = EnvironmentResolution & { variant: WorkflowVariant };

export function environmentsCommand(
  config: BatchConfig,
  opts: { environment?: string; json?: boolean } = {},
): EnvironmentRow[] {
  const table = buildEnvironmentTable(config);
  const rows = WORKFLOW_VARIANTS.map((variant) => ({
    variant,
    ...resolveEnvironment(variant, opts.environment, table),
  }));

  if (opts.json) {
    console.log(JSON.stringify(rows, null, 2));
    return rows;
  }

  const width = Math.max(...rows.map((row) => row.variant.length));
  for (const row of rows) {
    console.log(`${row.variant.padEnd(width)}  ${row.environment}  (${row.source})`);
  }
  return rows;
}
