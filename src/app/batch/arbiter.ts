import type {
  ArbiterDecision,
  ExecutionResult,
  TaskState,
  TerminalTaskState,
  VerificationVerdict,
} from "./types.js";

// =============================================================================
// POLICY
// =============================================================================

export type ArbiterPolicy = {
  // Reported when the tool exits 0 but the output directory is incomplete.
  incompleteExitCode: number;
};

export const DEFAULT_ARBITER_POLICY: ArbiterPolicy = { incompleteExitCode: 1 };

/**
 * Reconciles the tool's self-reported status with the observed output.
 *
 * A complete verdict wins over any raw status. An incomplete verdict
 * re-surfaces the raw status unchanged, except that a raw 0 is never passed
 * upstream as success.
 */
export function arbitrate(
  execution: Pick<ExecutionResult, "exitCode">,
  verdict: Pick<VerificationVerdict, "complete">,
  policy: ArbiterPolicy = DEFAULT_ARBITER_POLICY,
): ArbiterDecision {
  if (verdict.complete) {
    return {
      state: "succeeded",
      exitCode: 0,
      reason: execution.exitCode === 0 ? "verified" : "recovered",
    };
  }

  if (execution.exitCode !== 0) {
    return { state: "failed", exitCode: execution.exitCode, reason: "incomplete" };
  }

  return {
    state: "failed",
    exitCode: policy.incompleteExitCode,
    reason: "incomplete-reported-success",
  };
}

// =============================================================================
// STATE MACHINE
// =============================================================================

export type TaskEvent =
  | { type: "process.terminated" }
  | { type: "verification.complete"; complete: boolean };

export class BatchTaskStateMachine {
  private current: TaskState = "invoking";

  get state(): TaskState {
    return this.current;
  }

  get isTerminal(): boolean {
    return this.current === "succeeded" || this.current === "failed";
  }

  transition(event: TaskEvent): TaskState {
    this.current = nextState(this.current, event);
    return this.current;
  }
}

export function nextState(state: TaskState, event: TaskEvent): TaskState {
  if (state === "invoking" && event.type === "process.terminated") {
    return "verifying";
  }

  if (state === "verifying" && event.type === "verification.complete") {
    const terminal: TerminalTaskState = event.complete ? "succeeded" : "failed";
    return terminal;
  }

  throw new Error(`Illegal task transition: ${event.type} while ${state}`);
}
