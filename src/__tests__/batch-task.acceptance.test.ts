import fs from "node:fs";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { runCommand } from "../cli/run.js";
import { UserFacingError } from "../core/errors.js";
import { main } from "../index.js";

import {
  createBatchWorkspace,
  FakeBatchInvoker,
  writeResultTree,
  type BatchWorkspace,
} from "./helpers/batch-fixtures.js";

let ws: BatchWorkspace;

beforeEach(() => {
  ws = createBatchWorkspace("acceptance-");
});

afterEach(() => {
  ws.cleanup();
  process.exitCode = undefined;
});

function captureConsole(): { logs: string[]; errors: string[] } {
  const logs: string[] = [];
  const errors: string[] = [];
  vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
    logs.push(args.map(String).join(" "));
  });
  vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
    errors.push(args.map(String).join(" "));
  });
  vi.spyOn(process.stdout, "write").mockImplementation(() => true);
  return { logs, errors };
}

describe("msbatch run (fake tool)", () => {
  it("succeeds with three artifacts when the tool exits 1 but every input has a result", async () => {
    const output = captureConsole();
    const inputs = ws.inputs("s1.cdf", "s2.cdf", "s3.cdf");
    const invoker = new FakeBatchInvoker(({ job }) => {
      writeResultTree(job.outputDir, ["s1", "s2", "s3"], (name) => [`${name}.csv`]);
      return { stdout: "", exitCode: 1, durationMs: 3 };
    });

    const outcome = await runCommand(
      "gcms",
      ws.config,
      {
        inputs,
        outputDir: ws.outputDir,
        params: ws.paramsFile,
        calibration: ws.reference("fames.cdf"),
        runId: "e2e-1",
      },
      { invoker },
    );

    expect(process.exitCode).toBe(0);
    expect(outcome.state).toBe("succeeded");
    expect(outcome.artifacts).toHaveLength(3);
    expect(output.logs[0]).toBe(
      "Run e2e-1 succeeded (3/3 result directories, 3 artifact(s); tool reported 1, overridden).",
    );
    expect(output.logs.slice(1)).toEqual(outcome.artifacts);
  });

  it("fails with status 1 when the tool exits 0 but one input has no result", async () => {
    const output = captureConsole();
    const inputs = ws.inputs("s1.cdf", "s2.cdf", "s3.cdf");
    const invoker = new FakeBatchInvoker(({ job }) => {
      writeResultTree(job.outputDir, ["s1", "s2"], (name) => [`${name}.csv`]);
      return { stdout: "", exitCode: 0, durationMs: 3 };
    });

    const outcome = await runCommand(
      "gcms",
      ws.config,
      {
        inputs,
        outputDir: ws.outputDir,
        params: ws.paramsFile,
        calibration: ws.reference("fames.cdf"),
        runId: "e2e-2",
      },
      { invoker },
    );

    expect(process.exitCode).toBe(1);
    expect(outcome.state).toBe("failed");
    expect(output.logs[0]).toBe(
      "Run e2e-2 failed with status 1 (2/3 result directories; tool reported 0).",
    );
    expect(output.logs[1]).toBe(`  missing result: ${path.join(ws.root, "raw", "s3.cdf")}`);
  });

  it("prints the outcome as JSON", async () => {
    const output = captureConsole();
    const inputs = ws.inputs("a.raw");
    const invoker = new FakeBatchInvoker(({ job }) => {
      writeResultTree(job.outputDir, ["a"], () => ["a_lipids.csv"]);
      return { stdout: "ok\n", exitCode: 0, durationMs: 3 };
    });

    await runCommand(
      "lcms-lipidomics",
      ws.config,
      {
        inputs,
        outputDir: ws.outputDir,
        params: ws.paramsFile,
        metabrefToken: ws.reference("metabref.token"),
        runId: "e2e-3",
        json: true,
      },
      { invoker },
    );

    const parsed = JSON.parse(output.logs.join("\n")) as Record<string, unknown>;
    expect(parsed.variant).toBe("lcms_lipidomics");
    expect(parsed.environment).toBe("microbiomedata/metams:3.3.1");
    expect(parsed.state).toBe("succeeded");
    expect(parsed.stdout).toBe("ok\n");
  });

  it("turns invalid jobs into usage errors", async () => {
    captureConsole();
    const invoker = new FakeBatchInvoker(() => ({ stdout: "", exitCode: 0, durationMs: 1 }));

    const error: unknown = await runCommand(
      "gcms",
      ws.config,
      { inputs: [], outputDir: ws.outputDir, params: ws.paramsFile },
      { invoker },
    ).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UserFacingError);
    if (!(error instanceof UserFacingError)) return;
    expect(error.title).toBe("Invalid batch job.");
    expect(error.exitCode).toBe(2);
    expect(error.message).toBe(
      "Invalid batch job: At least one input file is required.\n- At least one input file is required.",
    );
    expect(invoker.calls).toHaveLength(0);
  });

  it("refuses a lipidomics run without a metabref token before invoking the tool", async () => {
    captureConsole();
    const invoker = new FakeBatchInvoker(() => ({ stdout: "", exitCode: 0, durationMs: 1 }));

    const error: unknown = await runCommand(
      "lcms_lipidomics",
      ws.config,
      { inputs: ws.inputs("a.raw"), outputDir: ws.outputDir, params: ws.paramsFile },
      { invoker },
    ).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UserFacingError);
    if (!(error instanceof UserFacingError)) return;
    expect(error.exitCode).toBe(2);
    expect(error.message).toBe(
      [
        "The lcms_lipidomics workflow needs metabref_token reference file(s).",
        "- Missing reference file: metabref_token",
      ].join("\n"),
    );
    expect(invoker.calls).toHaveLength(0);
  });
});

describe("msbatch CLI entry point", () => {
  function writeConfig(): string {
    const configPath = path.join(ws.root, "msbatch.yaml");
    fs.writeFileSync(configPath, `logs_dir: ./logs\n`, "utf8");
    return configPath;
  }

  it("verifies an existing output directory", async () => {
    const output = captureConsole();
    writeResultTree(ws.outputDir, ["s1", "s2"], (name) => [`${name}.csv`]);

    await main([
      "node",
      "msbatch",
      "--config",
      writeConfig(),
      "verify",
      "--output-dir",
      ws.outputDir,
      "--expected",
      "2",
    ]);

    expect(process.exitCode).toBe(0);
    expect(output.logs).toEqual([`Complete: 2/2 result directories in ${ws.outputDir}`]);
  });

  it("exits 1 from verify when a result is missing", async () => {
    const output = captureConsole();
    writeResultTree(ws.outputDir, ["s1"], () => ["s1.csv"]);

    await main([
      "node",
      "msbatch",
      "--config",
      writeConfig(),
      "verify",
      "--output-dir",
      ws.outputDir,
      "--inputs",
      "raw/s1.cdf,raw/s2.cdf",
    ]);

    expect(process.exitCode).toBe(1);
    expect(output.logs).toEqual([
      `Incomplete: 1/2 result directories in ${ws.outputDir}`,
      "  missing result: raw/s2.cdf",
    ]);
  });

  it("renders unknown variants as usage errors", async () => {
    const output = captureConsole();

    await main([
      "node",
      "msbatch",
      "--config",
      writeConfig(),
      "run",
      "nmr",
      "--input",
      "a.cdf",
      "--output-dir",
      ws.outputDir,
      "--params",
      ws.paramsFile,
    ]);

    expect(process.exitCode).toBe(2);
    expect(output.errors).toEqual([
      [
        "Error: Unknown workflow variant.",
        '"nmr" is not a workflow variant.',
        "Hint: Use one of: gcms, lcms_lipidomics, lcms_metabolomics.",
      ].join("\n"),
    ]);
  });

  it("renders missing required options as usage errors", async () => {
    const output = captureConsole();

    await main(["node", "msbatch", "run", "gcms", "--input", "a.cdf"]);

    expect(process.exitCode).toBe(2);
    expect(output.errors[0]).toContain("Error: Invalid command usage.");
    expect(output.errors[0]).toContain("required option '--output-dir <dir>' not specified");
  });

  it("rejects malformed integer options as usage errors", async () => {
    const output = captureConsole();

    await main([
      "node",
      "msbatch",
      "--config",
      writeConfig(),
      "verify",
      "--output-dir",
      ws.outputDir,
      "--expected",
      "3abc",
    ]);

    expect(process.exitCode).toBe(2);
    expect(output.errors[0]).toContain("Error: Invalid command usage.");
    expect(output.errors[0]).toContain(
      "option '--expected <n>' argument '3abc' is invalid. Expected a non-negative integer.",
    );
  });
});
