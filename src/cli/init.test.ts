import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { loadBatchConfig } from "../core/config-loader.js";

import { initCommand } from "./init.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

describe("initCommand", () => {
  it("writes a loadable config and leaves an existing one alone without --force", async () => {
    const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "init-"));
    tempDirs.push(cwd);
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);

    const first = await initCommand({ cwd });
    fs.appendFileSync(first.configPath, "timeout_seconds: 60\n", "utf8");
    const second = await initCommand({ cwd });
    const third = await initCommand({ cwd, force: true });

    expect(first).toEqual({ status: "created", configPath: path.join(cwd, "msbatch.yaml") });
    expect(second.status).toBe("exists");
    expect(third.status).toBe("overwritten");
    expect(loadBatchConfig(first.configPath).timeout_seconds).toBeUndefined();
    expect(logSpy).toHaveBeenCalledWith(
      `Config already exists at ${first.configPath} (use --force to overwrite)`,
    );
  });
});
