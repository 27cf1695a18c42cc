import type { WorkflowVariant } from "../../core/variants.js";

// =============================================================================
// EXECUTION
// =============================================================================

export type ExecutionResult = {
  stdout: string;
  // Raw process status; signal terminations are reported as 128 + signal number.
  exitCode: number;
  durationMs: number;
};

// =============================================================================
// VERIFICATION
// =============================================================================

export type OutputLayout = {
  outputDir: string;
  exists: boolean;
  subdirectories: string[];
  // Only subdirectories that were scanned have an entry.
  artifactPresence: Record<string, boolean>;
};

export type VerificationVerdict = {
  complete: boolean;
  expectedCount: number;
  observedCount: number;
  countMismatch: { expected: number; observed: number } | null;
  subdirectoriesMissingArtifacts: string[];
};

export type LayoutDiagnostics = {
  missingInputs: string[];
  unexpectedSubdirectories: string[];
};

// =============================================================================
// OUTCOME
// =============================================================================

export type TaskState = "invoking" | "verifying" | "succeeded" | "failed";
export type TerminalTaskState = Extract<TaskState, "succeeded" | "failed">;

export type ArbiterReason =
  | "verified"
  | "recovered"
  | "incomplete"
  | "incomplete-reported-success";

export type ArbiterDecision = {
  state: TerminalTaskState;
  exitCode: number;
  reason: ArbiterReason;
};

export type TaskOutcome = {
  runId: string;
  variant: WorkflowVariant;
  environment: string;
  state: TerminalTaskState;
  exitCode: number;
  rawExitCode: number;
  reason: ArbiterReason;
  recovered: boolean;
  stdout: string;
  verdict: VerificationVerdict;
  diagnostics: LayoutDiagnostics;
  artifacts: string[];
};
