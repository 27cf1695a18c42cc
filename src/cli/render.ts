/*
Purpose: render what the CLI prints: errors, run summaries and verify verdicts.
Assumptions: color only on a TTY and never under NO_COLOR; the plain text is
identical with or without color.
Usage: console.error(renderCliError(err, { debug })); console.log(renderRunSummary(outcome));
*/

import type { TaskOutcome, VerificationVerdict } from "../app/batch/types.js";
import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type AnsiStyle,
  type ErrorFormatLine,
  type ErrorFormatLineKind,
} from "../core/error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export type RenderOptions = {
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

export type CliErrorFormatOptions = RenderOptions & {
  debug?: boolean;
};

type LabelledKind = Exclude<ErrorFormatLineKind, "title" | "message">;

const ERROR_LINE_LABELS: Record<LabelledKind, { label: string; styles: AnsiStyle[] }> = {
  hint: { label: "Hint:", styles: ["yellow"] },
  next: { label: "Next:", styles: ["cyan"] },
  code: { label: "Code:", styles: ["dim"] },
  name: { label: "Name:", styles: ["dim"] },
  cause: { label: "Cause:", styles: ["dim"] },
  stack: { label: "Stack:", styles: ["dim"] },
};

// =============================================================================
// ERRORS
// =============================================================================

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const format = resolveFormatter(options, process.stderr);
  return formatErrorLines(error, { mode: options.debug ? "debug" : "short" })
    .map((line) => renderErrorLine(line, format))
    .join("\n");
}

function renderErrorLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  if (line.kind === "title") {
    return `${format("Error:", ["red", "bold"])} ${format(line.text, ["bold"])}`;
  }
  if (line.kind === "message") {
    return line.text;
  }

  const { label, styles } = ERROR_LINE_LABELS[line.kind];
  if (line.kind === "stack") {
    const indented = line.text
      .split("\n")
      .map((stackLine) => `  ${stackLine}`)
      .join("\n");
    return `${format(label, styles)}\n${format(indented, styles)}`;
  }
  return `${format(label, styles)} ${format(line.text, styles)}`;
}

// =============================================================================
// RUN SUMMARY
// =============================================================================

/**
 * One status line per run. A recovered run says so, since the tool's own
 * status was overridden.
 */
export function renderRunSummary(outcome: TaskOutcome, options: RenderOptions = {}): string {
  const format = resolveFormatter(options, process.stdout);
  const counts = formatCounts(outcome.verdict);

  if (outcome.state === "succeeded") {
    const head = format(`Run ${outcome.runId} succeeded`, ["green", "bold"]);
    const recovered = outcome.recovered
      ? `; ${format(`tool reported ${outcome.rawExitCode}, overridden`, ["yellow"])}`
      : "";
    return `${head} (${counts}, ${outcome.artifacts.length} artifact(s)${recovered}).`;
  }

  const head = format(`Run ${outcome.runId} failed with status ${outcome.exitCode}`, [
    "red",
    "bold",
  ]);
  return `${head} (${counts}; tool reported ${outcome.rawExitCode}).`;
}

// =============================================================================
// VERIFY VERDICT
// =============================================================================

export function renderVerdict(
  verdict: VerificationVerdict,
  outputDir: string,
  options: RenderOptions = {},
): string {
  const format = resolveFormatter(options, process.stdout);
  const label = verdict.complete
    ? format("Complete", ["green", "bold"])
    : format("Incomplete", ["red", "bold"]);
  return `${label}: ${formatCounts(verdict)} in ${outputDir}`;
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatCounts(verdict: VerificationVerdict): string {
  return `${verdict.observedCount}/${verdict.expectedCount} result directories`;
}

function resolveFormatter(
  options: RenderOptions,
  defaultStream: { isTTY?: boolean },
): AnsiFormatter {
  const stream = options.stream ?? defaultStream;
  return createAnsiFormatter(resolveColorEnabled({ stream, useColor: options.useColor }));
}
