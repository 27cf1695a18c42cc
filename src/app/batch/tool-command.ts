import { INPUT_DELIMITER, type BatchJob } from "../../core/batch-job.js";
import { BatchJobError } from "../../core/errors.js";
import type { ArgumentSlot, ReferenceKind, VariantSpec } from "../../core/variants.js";

export type ToolCommand = {
  executable: string;
  args: string[];
};

export function buildToolCommand(
  job: BatchJob,
  spec: VariantSpec,
  executable: string,
): ToolCommand {
  const references = new Map<ReferenceKind, string>(
    job.references.map((ref) => [ref.kind, ref.path]),
  );

  const missing = spec.requiredReferences.filter((kind) => !references.has(kind));
  if (missing.length > 0) {
    throw new BatchJobError(
      `The ${job.variant} workflow needs ${missing.join(", ")} reference file(s).`,
      missing.map((kind) => `Missing reference file: ${kind}`),
    );
  }

  const args = [spec.subcommand];
  const { layout } = spec;

  if (layout.style === "positional") {
    const accepted = new Set<ReferenceKind>();
    for (const slot of layout.slots) {
      if (slot.source === "reference") accepted.add(slot.kind);
      args.push(resolveSlot(slot, job, references));
    }
    rejectUnsupported(job, [...references.keys()].filter((kind) => !accepted.has(kind)));
  } else {
    args.push(
      layout.inputFlag,
      job.inputs.join(INPUT_DELIMITER),
      layout.outputFlag,
      job.outputDir,
      layout.paramsFlag,
      job.paramsFile,
    );
    rejectUnsupported(
      job,
      job.references.filter((ref) => !layout.referenceFlags[ref.kind]).map((ref) => ref.kind),
    );
    for (const ref of job.references) {
      const flag = layout.referenceFlags[ref.kind];
      if (flag) args.push(flag, ref.path);
    }
  }

  args.push("-j", String(job.workers));

  return { executable, args };
}

function resolveSlot(
  slot: ArgumentSlot,
  job: BatchJob,
  references: ReadonlyMap<ReferenceKind, string>,
): string {
  switch (slot.source) {
    case "inputs":
      return job.inputs.join(INPUT_DELIMITER);
    case "output_dir":
      return job.outputDir;
    case "params":
      return job.paramsFile;
    case "literal":
      return slot.value;
    case "reference": {
      const value = references.get(slot.kind) ?? slot.fallback;
      if (value === undefined) {
        throw new BatchJobError(`The ${job.variant} workflow needs a ${slot.kind} reference file.`, [
          `Missing reference file: ${slot.kind}`,
        ]);
      }
      return value;
    }
  }
}

function rejectUnsupported(job: BatchJob, kinds: ReferenceKind[]): void {
  if (kinds.length === 0) return;
  throw new BatchJobError(
    `The ${job.variant} workflow does not accept a ${kinds.join(", ")} reference file.`,
    kinds.map((kind) => `Unsupported reference file: ${kind}`),
  );
}

export function formatToolCommand(command: ToolCommand): string {
  return [command.executable, ...command.args].map(quoteArg).join(" ");
}

function quoteArg(arg: string): string {
  return /^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`;
}
