/**
 * Completion verification for a finished batch run.
 * Purpose: decide from the output directory alone whether every input produced a result.
 * Assumptions: the tool writes one subdirectory per input, named after the input's file stem.
 * Usage: verify(job.inputs.length, await readOutputLayout(job.outputDir, { artifactPattern }))
 */

import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";

import fg from "fast-glob";

import { fileStem } from "../../core/utils.js";

import type { LayoutDiagnostics, OutputLayout, VerificationVerdict } from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export type ReadOutputLayoutOptions = {
  artifactPattern: string;
  // Stop scanning once the aggregate verdict is known to be false.
  shortCircuit?: boolean;
  expectedCount?: number;
};

// =============================================================================
// LAYOUT
// =============================================================================

export async function readOutputLayout(
  outputDir: string,
  opts: ReadOutputLayoutOptions,
): Promise<OutputLayout> {
  const subdirectories = await listChildDirectories(outputDir);
  const layout: OutputLayout = {
    outputDir,
    exists: subdirectories !== null,
    subdirectories: subdirectories ?? [],
    artifactPresence: {},
  };

  const shortCircuit = opts.shortCircuit ?? true;
  if (
    shortCircuit &&
    opts.expectedCount !== undefined &&
    layout.subdirectories.length !== opts.expectedCount
  ) {
    return layout;
  }

  for (const name of layout.subdirectories) {
    const present = await hasArtifact(path.join(outputDir, name), opts.artifactPattern);
    layout.artifactPresence[name] = present;
    if (!present && shortCircuit) {
      break;
    }
  }

  return layout;
}

// =============================================================================
// VERDICT
// =============================================================================

export function verify(expectedCount: number, layout: OutputLayout): VerificationVerdict {
  const observedCount = layout.subdirectories.length;
  const countMatches = observedCount === expectedCount;

  const subdirectoriesMissingArtifacts = layout.subdirectories.filter(
    (name) => layout.artifactPresence[name] === false,
  );
  const allVerified = layout.subdirectories.every((name) => layout.artifactPresence[name] === true);

  return {
    complete: countMatches && allVerified,
    expectedCount,
    observedCount,
    countMismatch: countMatches ? null : { expected: expectedCount, observed: observedCount },
    subdirectoriesMissingArtifacts,
  };
}

export function diagnoseLayout(inputs: readonly string[], layout: OutputLayout): LayoutDiagnostics {
  const present = new Set(layout.subdirectories);
  const expected = new Set(inputs.map(fileStem));

  return {
    missingInputs: inputs.filter((input) => !present.has(fileStem(input))),
    unexpectedSubdirectories: layout.subdirectories.filter((name) => !expected.has(name)),
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

async function listChildDirectories(dir: string): Promise<string[] | null> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (isMissingPathError(err)) return null;
    throw err;
  }

  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
}

async function hasArtifact(dir: string, pattern: string): Promise<boolean> {
  const matches = await fg(pattern, { cwd: dir, onlyFiles: true, dot: true });
  return matches.length > 0;
}

function isMissingPathError(err: unknown): boolean {
  if (!(err instanceof Error) || !("code" in err)) return false;
  return err.code === "ENOENT" || err.code === "ENOTDIR";
}
