import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { createBatchJob, type BatchJob } from "../../../core/batch-job.js";
import { defaultBatchConfig } from "../../../core/config.js";
import { UserFacingError } from "../../../core/errors.js";
import { JsonlLogger } from "../../../core/logger.js";
import { DEFAULT_VARIANT_SPECS } from "../../../core/variants.js";
import { FakeContainer, FakeDocker } from "../../../docker/__tests__/fakes.js";
import { DockerManager } from "../../../docker/manager.js";
import { buildToolCommand } from "../tool-command.js";

import type { BatchInvocationInput } from "./batch-invoker.js";
import { buildBatchContainerName, buildBinds, DockerBatchInvoker } from "./docker-batch-invoker.js";

const IMAGE = "microbiomedata/metams:3.3.3";
const tempDirs: string[] = [];

function gcmsJob(): BatchJob {
  return createBatchJob({
    variant: "gcms",
    inputs: ["/data/raw/s1.cdf", "/data/raw/s2.cdf"],
    paramsFile: "/params/gcms.toml",
    references: [{ kind: "calibration", path: "/refs/fames.cdf" }],
    workers: 2,
    outputDir: "/data/out",
  });
}

function invocation(job: BatchJob, timeoutSeconds?: number): BatchInvocationInput & { logPath: string } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "docker-invoker-"));
  tempDirs.push(dir);
  const logPath = path.join(dir, "events.jsonl");
  return {
    runId: "20240301-120000",
    job,
    environment: IMAGE,
    command: buildToolCommand(job, DEFAULT_VARIANT_SPECS.gcms, "metaMS"),
    timeoutSeconds,
    logger: new JsonlLogger(logPath, { runId: "20240301-120000", variant: job.variant }),
    logPath,
  };
}

function readEvents(logPath: string): Array<{ type: string; payload?: Record<string, unknown> }> {
  return fs
    .readFileSync(logPath, "utf8")
    .trim()
    .split("\n")
    .map((line) => JSON.parse(line) as { type: string; payload?: Record<string, unknown> });
}

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

describe("DockerBatchInvoker", () => {
  it("runs the tool in the environment image with identical-path mounts", async () => {
    const container = new FakeContainer({
      chunks: ["STDOUT:2 samples processed\n", "STDERR:warning: s2 has no peaks\n"],
      statusCode: 1,
    });
    const docker = new FakeDocker(container, {
      images: [IMAGE],
      existingNames: ["msbatch-gcms-20240301-120000"],
    });
    const invoker = new DockerBatchInvoker({
      dockerManager: new DockerManager({ docker: docker.asDocker() }),
      docker: { ...defaultBatchConfig().docker, user: "1000:1000", memory_bytes: 1024 },
    });
    const input = invocation(gcmsJob());

    const result = await invoker.invoke(input);
    input.logger.close();

    expect(result.stdout).toBe("2 samples processed\n");
    expect(result.exitCode).toBe(1);
    expect(docker.removedStale).toEqual(["stale-0"]);

    const opts = docker.created[0];
    expect(opts?.Image).toBe(IMAGE);
    expect(opts?.name).toBe("msbatch-gcms-20240301-120000");
    expect(opts?.WorkingDir).toBe("/data/out");
    expect(opts?.User).toBe("1000:1000");
    expect(opts?.HostConfig?.Memory).toBe(1024);
    expect(opts?.Cmd).toEqual([
      "metaMS",
      "run-gcms-wdl-workflow",
      "/data/raw/s1.cdf,/data/raw/s2.cdf",
      "/refs/fames.cdf",
      "/data/out",
      "gcms_results",
      "csv",
      "/params/gcms.toml",
      "none",
      "-j",
      "2",
    ]);
    expect(opts?.HostConfig?.Binds).toEqual([
      "/data/out:/data/out:rw",
      "/data/raw:/data/raw:ro",
      "/params:/params:ro",
      "/refs:/refs:ro",
    ]);

    const stderrEvents = readEvents(input.logPath).filter((e) => e.type === "tool.stderr");
    expect(stderrEvents.map((e) => e.payload?.line)).toEqual(["warning: s2 has no peaks"]);
  });

  it("fails as not resolvable when the image is missing", async () => {
    const docker = new FakeDocker(new FakeContainer());
    const invoker = new DockerBatchInvoker({
      dockerManager: new DockerManager({ docker: docker.asDocker() }),
    });
    const input = invocation(gcmsJob());

    const error: unknown = await invoker.invoke(input).catch((err: unknown) => err);
    input.logger.close();

    expect(error).toBeInstanceOf(UserFacingError);
    if (!(error instanceof UserFacingError)) return;
    expect(error.exitCode).toBe(127);
    expect(error.hint).toBe(`Pull it first (docker pull ${IMAGE}) or pass --environment <image>.`);
    expect(docker.created).toHaveLength(0);
  });

  it("kills the container and reports a timeout", async () => {
    const container = new FakeContainer({ hang: true });
    const docker = new FakeDocker(container, { images: [IMAGE] });
    const invoker = new DockerBatchInvoker({
      dockerManager: new DockerManager({ docker: docker.asDocker() }),
    });
    const input = invocation(gcmsJob(), 0.02);

    const error: unknown = await invoker.invoke(input).catch((err: unknown) => err);
    input.logger.close();

    expect(error).toBeInstanceOf(UserFacingError);
    if (!(error instanceof UserFacingError)) return;
    expect(error.exitCode).toBe(124);
    expect(container.killed).toBe(true);
    expect(container.removed).toBe(true);
  });
});

describe("buildBinds", () => {
  it("keeps the output directory writable when inputs live inside it", () => {
    const job = createBatchJob({
      variant: "gcms",
      inputs: ["/work/s1.cdf"],
      paramsFile: "/work/params.toml",
      outputDir: "/work",
    });

    expect(buildBinds(job)).toEqual([{ hostPath: "/work", containerPath: "/work", mode: "rw" }]);
  });
});

describe("buildBatchContainerName", () => {
  it("replaces characters docker rejects", () => {
    expect(buildBatchContainerName(gcmsJob(), "run 1/retry")).toBe("msbatch-gcms-run-1-retry");
  });
});
