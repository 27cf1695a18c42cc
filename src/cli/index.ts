import { Command, InvalidArgumentError, Option } from "commander";

import { splitInputList } from "../core/batch-job.js";
import type { Runtime } from "../core/config.js";
import { WORKFLOW_VARIANTS } from "../core/variants.js";

import { loadConfigForCli } from "./config.js";
import { environmentsCommand } from "./environments.js";
import { initCommand } from "./init.js";
import { runCommand } from "./run.js";
import { verifyCommand } from "./verify.js";

type GlobalOptions = { config?: string; debug?: boolean };

type RunCliOptions = {
  input?: string[];
  inputs?: string[];
  outputDir: string;
  params: string;
  spectralDb?: string;
  scanTranslator?: string;
  calibration?: string;
  metabrefToken?: string;
  nmdcMetadata?: string;
  workers?: number;
  environment?: string;
  runtime?: Runtime;
  timeout?: number;
  runId?: string;
  checkInputs: boolean;
  json: boolean;
};

type VerifyCliOptions = {
  outputDir: string;
  expected?: number;
  inputs?: string;
  pattern?: string;
  exhaustive: boolean;
  json: boolean;
};

export function buildCli(): Command {
  const program = new Command();

  const resolveConfig = () => {
    const globals = program.opts<GlobalOptions>();
    return loadConfigForCli({ explicitConfigPath: globals.config }).config;
  };

  program
    .name("msbatch")
    .description("Batch dispatch and completion verification for mass-spectrometry workflows")
    .version("0.1.0")
    .option("--config <path>", "Config file (defaults to $MSBATCH_CONFIG or ./msbatch.yaml)")
    .option("--debug", "Show error codes, causes and stack traces", false);

  program
    .command("init")
    .description("Write a msbatch.yaml config template in the current directory")
    .option("--force", "Overwrite an existing config", false)
    .action(async (opts: { force: boolean }) => {
      await initCommand({ force: opts.force });
    });

  program
    .command("run")
    .description("Run one workflow task over a batch of inputs and verify its output")
    .argument("<variant>", `Workflow variant (${WORKFLOW_VARIANTS.join(", ")})`)
    .option("--input <paths...>", "Input data files")
    .option("--inputs <list>", "Comma-separated input data files", splitInputList)
    .requiredOption("--output-dir <dir>", "Output directory (one subdirectory per input)")
    .requiredOption("--params <file>", "Workflow parameter file")
    .option("--spectral-db <file>", "Spectral database reference file")
    .option("--scan-translator <file>", "Scan translator reference file")
    .option("--calibration <file>", "Calibration reference file")
    .option("--metabref-token <file>", "MetabRef API token file")
    .option("--nmdc-metadata <file>", "NMDC metadata file")
    .option(
      "--workers <n>",
      "Worker count passed to the tool (default depends on the variant)",
      parsePositiveInt,
    )
    .option("--environment <id>", "Environment (image) override")
    .addOption(new Option("--runtime <runtime>", "Where the tool runs").choices(["docker", "local"]))
    .option("--timeout <seconds>", "Kill the tool after this many seconds", parsePositiveInt)
    .option("--run-id <id>", "Run ID (default: timestamp)")
    .option("--no-check-inputs", "Skip pre-dispatch input checks")
    .option("--json", "Print the task outcome as JSON", false)
    .action(async (variant: string, opts: RunCliOptions) => {
      await runCommand(variant, resolveConfig(), {
        inputs: [...(opts.input ?? []), ...(opts.inputs ?? [])],
        outputDir: opts.outputDir,
        params: opts.params,
        spectralDb: opts.spectralDb,
        scanTranslator: opts.scanTranslator,
        calibration: opts.calibration,
        metabrefToken: opts.metabrefToken,
        nmdcMetadata: opts.nmdcMetadata,
        workers: opts.workers,
        environment: opts.environment,
        runtime: opts.runtime,
        timeout: opts.timeout,
        runId: opts.runId,
        checkInputs: opts.checkInputs,
        json: opts.json,
      });
    });

  program
    .command("verify")
    .description("Check an existing output directory for completeness")
    .requiredOption("--output-dir <dir>", "Output directory to inspect")
    .option("--expected <n>", "Expected number of result directories", parseNonNegativeInt)
    .option("--inputs <list>", "Comma-separated inputs (sets the expected count)")
    .option("--pattern <glob>", "Artifact pattern matched inside each result directory")
    .option("--exhaustive", "Scan every result directory even after a miss", false)
    .option("--json", "Print the verdict as JSON", false)
    .action(async (opts: VerifyCliOptions) => {
      await verifyCommand(resolveConfig(), opts);
    });

  program
    .command("environments")
    .description("Show the environment each workflow variant resolves to")
    .option("--environment <id>", "Environment override to apply")
    .option("--json", "Print as JSON", false)
    .action((opts: { environment?: string; json: boolean }) => {
      environmentsCommand(resolveConfig(), opts);
    });

  return program;
}

// Number() alone would take "", "0x10" and "1e3".
const INTEGER_PATTERN = /^\d+$/;

export function parsePositiveInt(value: string): number {
  const parsed = parseDigits(value);
  if (parsed === null || parsed === 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

export function parseNonNegativeInt(value: string): number {
  const parsed = parseDigits(value);
  if (parsed === null) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

function parseDigits(value: string): number | null {
  const trimmed = value.trim();
  return INTEGER_PATTERN.test(trimmed) ? Number(trimmed) : null;
}
