import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { buildEnvironmentTable, resolveVariantSpec } from "../core/config.js";
import {
  CONFIG_ENV_VAR,
  DEFAULT_CONFIG_FILE,
  loadBatchConfig,
  loadConfig,
  renderConfigTemplate,
  resolveConfigPath,
} from "../core/config-loader.js";
import { UserFacingError } from "../core/errors.js";

const tempDirs: string[] = [];

function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "config-loader-"));
  tempDirs.push(dir);
  return dir;
}

function writeConfig(filename: string, contents: string): string {
  const configPath = path.join(makeTempDir(), filename);
  fs.writeFileSync(configPath, contents, "utf8");
  return configPath;
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected function to throw");
}

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

describe("loadBatchConfig", () => {
  it("expands environment variables and resolves relative paths", () => {
    const original = process.env.MSBATCH_TEST_IMAGE;
    process.env.MSBATCH_TEST_IMAGE = "registry.local/metams:dev";

    const configPath = writeConfig(
      "msbatch.yaml",
      `
runtime: local
logs_dir: ./logs
timeout_seconds: 3600
environments:
  gcms: \${MSBATCH_TEST_IMAGE}
verification:
  incomplete_exit_code: 3
`,
    );

    try {
      const config = loadBatchConfig(configPath);

      expect(config.runtime).toBe("local");
      expect(config.logs_dir).toBe(path.resolve(path.dirname(configPath), "./logs"));
      expect(config.timeout_seconds).toBe(3600);
      expect(config.environments.gcms).toBe("registry.local/metams:dev");
      expect(config.verification).toEqual({ incomplete_exit_code: 3, short_circuit: true });
      expect(config.docker.network_mode).toBe("bridge");
      expect(config.executable).toBe("metaMS");
    } finally {
      if (original === undefined) {
        delete process.env.MSBATCH_TEST_IMAGE;
      } else {
        process.env.MSBATCH_TEST_IMAGE = original;
      }
    }
  });

  it("treats an empty file as all defaults", () => {
    const configPath = writeConfig("empty.yaml", "");

    const config = loadBatchConfig(configPath);

    expect(config.runtime).toBe("docker");
    expect(config.logs_dir).toBe(path.join(path.dirname(configPath), ".msbatch", "logs"));
    expect(config.verification.incomplete_exit_code).toBe(1);
  });

  it("reports schema issues with their location", () => {
    const configPath = writeConfig("bad.yaml", "runtime: kubernetes\n");

    const error = captureError(() => loadBatchConfig(configPath));

    expect(error).toBeInstanceOf(UserFacingError);
    if (!(error instanceof UserFacingError)) return;
    expect(error.title).toBe("Config invalid.");
    expect(error.exitCode).toBe(2);
    expect(error.message).toBe(
      `Invalid config at ${configPath}:\nruntime: Expected one of "docker", "local", received "kubernetes"`,
    );
  });

  it("rejects unknown keys", () => {
    const configPath = writeConfig("extra.yaml", "planner:\n  model: x\n");

    const error = captureError(() => loadBatchConfig(configPath));

    expect(error).toBeInstanceOf(UserFacingError);
    if (!(error instanceof UserFacingError)) return;
    expect(error.message).toContain("<root>: Unrecognized keys: planner");
  });

  it("reports unset environment variables", () => {
    const configPath = writeConfig("env.yaml", "executable: ${MSBATCH_UNSET_VARIABLE_FOR_TEST}\n");

    const error = captureError(() => loadBatchConfig(configPath));

    expect(error).toBeInstanceOf(UserFacingError);
    if (!(error instanceof UserFacingError)) return;
    expect(error.message).toBe(
      `Environment variable MSBATCH_UNSET_VARIABLE_FOR_TEST is not set but is referenced in ${configPath} (executable).`,
    );
  });

  it("reports YAML syntax errors with a line number", () => {
    const configPath = writeConfig("syntax.yaml", "runtime: [docker\n");

    const error = captureError(() => loadBatchConfig(configPath));

    expect(error).toBeInstanceOf(UserFacingError);
    if (!(error instanceof UserFacingError)) return;
    expect(error.message).toMatch(/^Failed to parse YAML config at .*\(line \d+, column \d+\)/);
  });

  it("fails with a usage error when the file is missing", () => {
    const missing = path.join(makeTempDir(), "nope.yaml");

    const error = captureError(() => loadBatchConfig(missing));

    expect(error).toBeInstanceOf(UserFacingError);
    if (!(error instanceof UserFacingError)) return;
    expect(error.title).toBe("Config missing.");
    expect(error.exitCode).toBe(2);
  });
});

describe("resolveConfigPath", () => {
  it("prefers an explicit path, then the environment, then the working directory", () => {
    const cwd = makeTempDir();
    fs.writeFileSync(path.join(cwd, DEFAULT_CONFIG_FILE), "", "utf8");

    expect(resolveConfigPath({ explicitPath: "custom.yaml", cwd, env: {} })).toEqual({
      configPath: path.join(cwd, "custom.yaml"),
      source: "explicit",
    });
    expect(resolveConfigPath({ cwd, env: { [CONFIG_ENV_VAR]: "/etc/msbatch.yaml" } })).toEqual({
      configPath: "/etc/msbatch.yaml",
      source: "env",
    });
    expect(resolveConfigPath({ cwd, env: {} })).toEqual({
      configPath: path.join(cwd, DEFAULT_CONFIG_FILE),
      source: "cwd",
    });
  });

  it("falls back to built-in defaults", () => {
    const cwd = makeTempDir();

    expect(resolveConfigPath({ cwd, env: {} })).toEqual({ configPath: null, source: "defaults" });
  });
});

describe("loadConfig", () => {
  it("resolves the default logs directory against the working directory", () => {
    const cwd = makeTempDir();
    const original = process.env[CONFIG_ENV_VAR];
    delete process.env[CONFIG_ENV_VAR];

    try {
      const loaded = loadConfig({ cwd });

      expect(loaded.source).toBe("defaults");
      expect(loaded.config.logs_dir).toBe(path.join(cwd, ".msbatch", "logs"));
    } finally {
      if (original !== undefined) process.env[CONFIG_ENV_VAR] = original;
    }
  });
});

describe("renderConfigTemplate", () => {
  it("round-trips through the loader", () => {
    const configPath = writeConfig(DEFAULT_CONFIG_FILE, renderConfigTemplate());

    const config = loadBatchConfig(configPath);

    expect(config.verification.artifact_pattern).toBe("*.csv");
    expect(buildEnvironmentTable(config)).toEqual({
      gcms: "microbiomedata/metams:3.3.3",
      lcms_lipidomics: "microbiomedata/metams:3.3.1",
      lcms_metabolomics: "microbiomedata/metams:3.3.2",
    });
  });
});

describe("resolveVariantSpec", () => {
  it("layers variant overrides over the global pattern and built-ins", () => {
    const configPath = writeConfig(
      "variants.yaml",
      `
verification:
  artifact_pattern: "*.tsv"
variants:
  lcms_lipidomics:
    artifact_pattern: "*_lipids.csv"
    reference_flags:
      calibration: "-r"
`,
    );
    const config = loadBatchConfig(configPath);

    expect(resolveVariantSpec(config, "lcms_lipidomics")).toEqual({
      subcommand: "run-lipidomics-workflow",
      artifactPattern: "*_lipids.csv",
      inputExtensions: [".raw", ".mzML"],
      layout: {
        style: "flagged",
        inputFlag: "-i",
        outputFlag: "-o",
        paramsFlag: "-c",
        referenceFlags: { metabref_token: "-t", scan_translator: "-s", calibration: "-r" },
      },
      requiredReferences: ["metabref_token"],
      defaultWorkers: 1,
    });
    expect(resolveVariantSpec(config, "gcms").artifactPattern).toBe("*.tsv");
  });

  it("keeps per-variant worker defaults unless overridden", () => {
    const configPath = writeConfig(
      "workers.yaml",
      `
variants:
  lcms_metabolomics:
    default_workers: 8
`,
    );
    const config = loadBatchConfig(configPath);

    expect(resolveVariantSpec(config, "gcms").defaultWorkers).toBe(4);
    expect(resolveVariantSpec(config, "lcms_lipidomics").defaultWorkers).toBe(1);
    expect(resolveVariantSpec(config, "lcms_metabolomics").defaultWorkers).toBe(8);
  });

  it("rejects reference flags for a positional entry point", () => {
    const configPath = writeConfig(
      "positional.yaml",
      `
variants:
  gcms:
    reference_flags:
      calibration: "-r"
`,
    );

    const error = captureError(() => loadBatchConfig(configPath));

    expect(error).toBeInstanceOf(UserFacingError);
    if (!(error instanceof UserFacingError)) return;
    expect(error.message).toBe(
      `Invalid config at ${configPath}:\nvariants.gcms.reference_flags: gcms takes positional arguments; reference_flags does not apply`,
    );
  });
});
