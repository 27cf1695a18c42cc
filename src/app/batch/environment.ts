import type { EnvironmentTable } from "../../core/config.js";
import type { WorkflowVariant } from "../../core/variants.js";

export type EnvironmentResolution = {
  environment: string;
  source: "override" | "default";
};

export function resolveEnvironment(
  variant: WorkflowVariant,
  override: string | undefined,
  table: EnvironmentTable,
): EnvironmentResolution {
  const trimmed = override?.trim();
  if (trimmed) {
    return { environment: trimmed, source: "override" };
  }

  return { environment: table[variant], source: "default" };
}
