import { z } from "zod";

// =============================================================================
// WORKFLOW VARIANTS
// =============================================================================

export const WorkflowVariantSchema = z.enum(["gcms", "lcms_lipidomics", "lcms_metabolomics"]);
export type WorkflowVariant = z.infer<typeof WorkflowVariantSchema>;

export const WORKFLOW_VARIANTS: readonly WorkflowVariant[] = WorkflowVariantSchema.options;

export const ReferenceKindSchema = z.enum([
  "spectral_database",
  "scan_translator",
  "calibration",
  "metabref_token",
  "nmdc_metadata",
]);
export type ReferenceKind = z.infer<typeof ReferenceKindSchema>;

// =============================================================================
// ARGUMENT LAYOUTS
// =============================================================================

export type ArgumentSlot =
  | { source: "inputs" }
  | { source: "output_dir" }
  | { source: "params" }
  | { source: "reference"; kind: ReferenceKind; fallback?: string }
  | { source: "literal"; value: string };

/**
 * How a workflow subcommand takes its arguments. Positional entry points take
 * every slot in order; flagged ones take each value behind its own option.
 * Both end with `-j <workers>`.
 */
export type ArgumentLayout =
  | { style: "positional"; slots: ArgumentSlot[] }
  | {
      style: "flagged";
      inputFlag: string;
      outputFlag: string;
      paramsFlag: string;
      referenceFlags: Partial<Record<ReferenceKind, string>>;
    };

export type VariantSpec = {
  subcommand: string;
  artifactPattern: string;
  inputExtensions: string[];
  layout: ArgumentLayout;
  requiredReferences: ReferenceKind[];
  defaultWorkers: number;
};

export const DEFAULT_ARTIFACT_PATTERN = "*.csv";

// Versioned environments each workflow task pins when no override is given.
export const DEFAULT_ENVIRONMENTS: Record<WorkflowVariant, string> = {
  gcms: "microbiomedata/metams:3.3.3",
  lcms_lipidomics: "microbiomedata/metams:3.3.1",
  lcms_metabolomics: "microbiomedata/metams:3.3.2",
};

export const DEFAULT_VARIANT_SPECS: Record<WorkflowVariant, VariantSpec> = {
  gcms: {
    subcommand: "run-gcms-wdl-workflow",
    artifactPattern: DEFAULT_ARTIFACT_PATTERN,
    inputExtensions: [".cdf"],
    layout: {
      style: "positional",
      slots: [
        { source: "inputs" },
        { source: "reference", kind: "calibration" },
        { source: "output_dir" },
        { source: "literal", value: "gcms_results" },
        { source: "literal", value: "csv" },
        { source: "params" },
        // Required by the entry point but not read by it.
        { source: "reference", kind: "nmdc_metadata", fallback: "none" },
      ],
    },
    requiredReferences: ["calibration"],
    defaultWorkers: 4,
  },
  lcms_lipidomics: {
    subcommand: "run-lipidomics-workflow",
    artifactPattern: DEFAULT_ARTIFACT_PATTERN,
    inputExtensions: [".raw", ".mzML"],
    layout: {
      style: "flagged",
      inputFlag: "-i",
      outputFlag: "-o",
      paramsFlag: "-c",
      referenceFlags: { metabref_token: "-t", scan_translator: "-s" },
    },
    // Without a token the tool exits 0 having processed nothing.
    requiredReferences: ["metabref_token"],
    defaultWorkers: 1,
  },
  lcms_metabolomics: {
    subcommand: "run-lcms-metabolomics-workflow",
    artifactPattern: DEFAULT_ARTIFACT_PATTERN,
    inputExtensions: [".raw", ".mzML"],
    layout: {
      style: "flagged",
      inputFlag: "-i",
      outputFlag: "-o",
      paramsFlag: "-c",
      referenceFlags: { spectral_database: "-m", scan_translator: "-s" },
    },
    requiredReferences: [],
    defaultWorkers: 1,
  },
};

export function parseWorkflowVariant(raw: string): WorkflowVariant | null {
  const normalized = raw.trim().toLowerCase().replace(/-/g, "_");
  const parsed = WorkflowVariantSchema.safeParse(normalized);
  return parsed.success ? parsed.data : null;
}
