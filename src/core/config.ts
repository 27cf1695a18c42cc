import { z } from "zod";

import {
  DEFAULT_ENVIRONMENTS,
  DEFAULT_VARIANT_SPECS,
  ReferenceKindSchema,
  WORKFLOW_VARIANTS,
  type VariantSpec,
  type WorkflowVariant,
} from "./variants.js";

export const RuntimeSchema = z.enum(["docker", "local"]);
export type Runtime = z.infer<typeof RuntimeSchema>;

const EnvironmentsSchema = z
  .object({
    gcms: z.string().min(1).optional(),
    lcms_lipidomics: z.string().min(1).optional(),
    lcms_metabolomics: z.string().min(1).optional(),
  })
  .strict();

const VerificationSchema = z.object({
  artifact_pattern: z.string().min(1).optional(),
  incomplete_exit_code: z.number().int().min(1).max(255).default(1),
  short_circuit: z.boolean().default(true),
});

const DockerSchema = z.object({
  network_mode: z.enum(["bridge", "none"]).default("bridge"),
  user: z.string().min(1).optional(),
  memory_bytes: z.number().int().positive().optional(),
  cpu_quota: z.number().int().positive().optional(),
  pids_limit: z.number().int().positive().optional(),
});

const VariantOverrideSchema = z
  .object({
    subcommand: z.string().min(1).optional(),
    artifact_pattern: z.string().min(1).optional(),
    input_extensions: z.array(z.string().min(1)).min(1).optional(),
    reference_flags: z.record(ReferenceKindSchema, z.string().min(1)).optional(),
    default_workers: z.number().int().positive().optional(),
  })
  .strict();

export const BatchConfigSchema = z
  .object({
    runtime: RuntimeSchema.default("docker"),
    executable: z.string().min(1).default("metaMS"),
    timeout_seconds: z.number().int().positive().optional(),
    logs_dir: z.string().min(1).default(".msbatch/logs"),
    environments: EnvironmentsSchema.default({}),
    verification: VerificationSchema.default({}),
    docker: DockerSchema.default({}),
    variants: z
      .object({
        gcms: VariantOverrideSchema.optional(),
        lcms_lipidomics: VariantOverrideSchema.optional(),
        lcms_metabolomics: VariantOverrideSchema.optional(),
      })
      .strict()
      .superRefine((variants, ctx) => {
        for (const variant of WORKFLOW_VARIANTS) {
          const override = variants[variant];
          if (override?.reference_flags && DEFAULT_VARIANT_SPECS[variant].layout.style === "positional") {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: [variant, "reference_flags"],
              message: `${variant} takes positional arguments; reference_flags does not apply`,
            });
          }
        }
      })
      .default({}),
  })
  .strict();

export type BatchConfig = z.infer<typeof BatchConfigSchema>;
export type DockerConfig = BatchConfig["docker"];

export type EnvironmentTable = Record<WorkflowVariant, string>;

// =============================================================================
// DERIVED SETTINGS
// =============================================================================

export function defaultBatchConfig(): BatchConfig {
  return BatchConfigSchema.parse({});
}

export function buildEnvironmentTable(config: BatchConfig): EnvironmentTable {
  const table = { ...DEFAULT_ENVIRONMENTS };
  for (const variant of WORKFLOW_VARIANTS) {
    const configured = config.environments[variant];
    if (configured) {
      table[variant] = configured;
    }
  }
  return table;
}

export function resolveVariantSpec(config: BatchConfig, variant: WorkflowVariant): VariantSpec {
  const base = DEFAULT_VARIANT_SPECS[variant];
  const override = config.variants[variant];

  return {
    subcommand: override?.subcommand ?? base.subcommand,
    artifactPattern:
      override?.artifact_pattern ?? config.verification.artifact_pattern ?? base.artifactPattern,
    inputExtensions: override?.input_extensions ?? base.inputExtensions,
    layout:
      base.layout.style === "flagged"
        ? {
            ...base.layout,
            referenceFlags: { ...base.layout.referenceFlags, ...override?.reference_flags },
          }
        : base.layout,
    requiredReferences: base.requiredReferences,
    defaultWorkers: override?.default_workers ?? base.defaultWorkers,
  };
}
