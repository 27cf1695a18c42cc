import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { BatchConfigSchema, defaultBatchConfig, type BatchConfig } from "./config.js";
import { ConfigError, EXIT_CODES, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { DEFAULT_ENVIRONMENTS } from "./variants.js";

// =============================================================================
// CONSTANTS
// =============================================================================

export const DEFAULT_CONFIG_FILE = "msbatch.yaml";
export const CONFIG_ENV_VAR = "MSBATCH_CONFIG";

const MISSING_CONFIG_HINT = "Run `msbatch init` to write a config file, or pass --config <path>.";
const INVALID_CONFIG_HINT = "Fix the config file and rerun. For a fresh config, run `msbatch init`.";

// =============================================================================
// TYPES
// =============================================================================

export type ConfigSource = "explicit" | "env" | "cwd" | "defaults";

export type ConfigResolution = {
  configPath: string | null;
  source: ConfigSource;
};

export type LoadedConfig = ConfigResolution & {
  config: BatchConfig;
};

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = process.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (isRecord(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function resolveConfigPath(args: {
  explicitPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}): ConfigResolution {
  const cwd = args.cwd ?? process.cwd();
  const env = args.env ?? process.env;

  if (args.explicitPath) {
    return { configPath: path.resolve(cwd, args.explicitPath), source: "explicit" };
  }

  const fromEnv = env[CONFIG_ENV_VAR]?.trim();
  if (fromEnv) {
    return { configPath: path.resolve(cwd, fromEnv), source: "env" };
  }

  const cwdConfig = path.join(cwd, DEFAULT_CONFIG_FILE);
  if (fs.existsSync(cwdConfig)) {
    return { configPath: cwdConfig, source: "cwd" };
  }

  return { configPath: null, source: "defaults" };
}

export function loadConfig(args: { explicitPath?: string; cwd?: string } = {}): LoadedConfig {
  const resolution = resolveConfigPath(args);
  if (!resolution.configPath) {
    const config = defaultBatchConfig();
    return {
      ...resolution,
      config: { ...config, logs_dir: path.resolve(args.cwd ?? process.cwd(), config.logs_dir) },
    };
  }

  return { ...resolution, config: loadBatchConfig(resolution.configPath) };
}

export function loadBatchConfig(configPath: string): BatchConfig {
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw createMissingConfigError(absolutePath);
  }

  try {
    let raw: string;
    try {
      raw = fs.readFileSync(absolutePath, "utf8");
    } catch (err) {
      throw new ConfigError(`Failed to read config at ${absolutePath}`, err);
    }

    let doc: unknown;
    try {
      doc = yaml.load(raw);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      const location = resolveYamlErrorLocation(err);
      const locationDetail = location ? ` (line ${location.line}, column ${location.column})` : "";
      throw new ConfigError(
        `Failed to parse YAML config at ${absolutePath}${locationDetail}: ${detail}`,
        err,
      );
    }

    // An empty file means "all defaults".
    const expanded = expandEnv(doc ?? {}, { file: absolutePath, trail: [] });

    const parsed = BatchConfigSchema.safeParse(expanded);
    if (!parsed.success) {
      const details = formatIssues(parsed.error.issues);
      throw new ConfigError(`Invalid config at ${absolutePath}:\n${details}`, parsed.error);
    }

    const cfg = parsed.data;
    const configDir = path.dirname(absolutePath);

    return {
      ...cfg,
      logs_dir: path.resolve(configDir, cfg.logs_dir),
    };
  } catch (err) {
    throwNormalizedConfigError(err, absolutePath);
  }
}

export function renderConfigTemplate(): string {
  const template = {
    runtime: "docker",
    executable: "metaMS",
    logs_dir: ".msbatch/logs",
    environments: { ...DEFAULT_ENVIRONMENTS },
    verification: {
      artifact_pattern: "*.csv",
      incomplete_exit_code: 1,
      short_circuit: true,
    },
    docker: {
      network_mode: "bridge",
    },
  };

  const header = [
    "# msbatch configuration",
    "# runtime: docker runs the tool inside the resolved environment image; local runs it on the host.",
    "# environments: default image per workflow variant (override per run with --environment).",
    "",
  ].join("\n");

  return `${header}${yaml.dump(template, { lineWidth: 100 })}`;
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

type YamlErrorLocation = {
  line: number;
  column: number;
};

function resolveYamlErrorLocation(error: unknown): YamlErrorLocation | null {
  if (!(error instanceof yaml.YAMLException)) {
    return null;
  }

  const mark: unknown = error.mark;
  if (!isRecord(mark)) {
    return null;
  }

  const { line, column } = mark;
  if (typeof line !== "number" || typeof column !== "number") {
    return null;
  }

  return { line: line + 1, column: column + 1 };
}

export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "invalid_enum_value") {
        const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
        return `${location}: Expected one of ${options}, received ${JSON.stringify(issue.received)}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

function createMissingConfigError(configPath: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Config missing.",
    message: `Config not found at ${configPath}.`,
    hint: MISSING_CONFIG_HINT,
    exitCode: EXIT_CODES.usage,
  });
}

function createInvalidConfigError(configPath: string, cause: ConfigError): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Config invalid.",
    message: cause.message || `Config at ${configPath} is invalid.`,
    hint: INVALID_CONFIG_HINT,
    cause,
    exitCode: EXIT_CODES.usage,
  });
}

function throwNormalizedConfigError(error: unknown, configPath: string): never {
  if (error instanceof UserFacingError) {
    throw error;
  }

  if (error instanceof ConfigError) {
    throw createInvalidConfigError(configPath, error);
  }

  throw error;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
