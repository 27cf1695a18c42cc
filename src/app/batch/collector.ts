import path from "node:path";

import fg from "fast-glob";

import { pathExists } from "../../core/utils.js";

export async function collectOutputs(outputDir: string): Promise<string[]> {
  if (!(await pathExists(outputDir))) {
    return [];
  }

  const files = await fg("**/*", {
    cwd: outputDir,
    onlyFiles: true,
    dot: true,
    followSymbolicLinks: false,
  });

  return files.map((file) => path.join(outputDir, file)).sort();
}
