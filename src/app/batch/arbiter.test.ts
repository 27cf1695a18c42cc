import { describe, expect, it } from "vitest";

import { arbitrate, BatchTaskStateMachine, nextState } from "./arbiter.js";

const complete = { complete: true };
const incomplete = { complete: false };

describe("arbitrate", () => {
  it.each([0, 1, 137])("reports success for a complete output whatever the raw status (%i)", (raw) => {
    const decision = arbitrate({ exitCode: raw }, complete);

    expect(decision.state).toBe("succeeded");
    expect(decision.exitCode).toBe(0);
  });

  it("distinguishes a verified run from a recovered one", () => {
    expect(arbitrate({ exitCode: 0 }, complete).reason).toBe("verified");
    expect(arbitrate({ exitCode: 1 }, complete).reason).toBe("recovered");
  });

  it("re-surfaces a nonzero raw status unchanged when incomplete", () => {
    expect(arbitrate({ exitCode: 137 }, incomplete)).toEqual({
      state: "failed",
      exitCode: 137,
      reason: "incomplete",
    });
  });

  it("never reports success for an incomplete output", () => {
    expect(arbitrate({ exitCode: 0 }, incomplete)).toEqual({
      state: "failed",
      exitCode: 1,
      reason: "incomplete-reported-success",
    });
    expect(arbitrate({ exitCode: 0 }, incomplete, { incompleteExitCode: 3 }).exitCode).toBe(3);
  });
});

describe("BatchTaskStateMachine", () => {
  it("moves from invoking through verifying to a terminal state", () => {
    const machine = new BatchTaskStateMachine();
    expect(machine.state).toBe("invoking");

    machine.transition({ type: "process.terminated" });
    expect(machine.state).toBe("verifying");
    expect(machine.isTerminal).toBe(false);

    machine.transition({ type: "verification.complete", complete: false });
    expect(machine.state).toBe("failed");
    expect(machine.isTerminal).toBe(true);
  });

  it("rejects verification before the process terminates", () => {
    expect(() => nextState("invoking", { type: "verification.complete", complete: true })).toThrow(
      "Illegal task transition: verification.complete while invoking",
    );
  });

  it("has no transitions out of a terminal state", () => {
    expect(() => nextState("succeeded", { type: "process.terminated" })).toThrow(
      "Illegal task transition: process.terminated while succeeded",
    );
  });
});
