import fs from "node:fs";
import path from "node:path";

import { DEFAULT_CONFIG_FILE, renderConfigTemplate } from "../core/config-loader.js";
import { writeTextFile } from "../core/utils.js";

// =============================================================================
// INIT (config scaffolding)
// =============================================================================

export type InitStatus = "created" | "overwritten" | "exists";

export async function initCommand(opts: {
  force?: boolean;
  cwd?: string;
}): Promise<{ status: InitStatus; configPath: string }> {
  const configPath = path.join(opts.cwd ?? process.cwd(), DEFAULT_CONFIG_FILE);
  const exists = fs.existsSync(configPath);

  if (exists && !opts.force) {
    console.log(`Config already exists at ${configPath} (use --force to overwrite)`);
    return { status: "exists", configPath };
  }

  await writeTextFile(configPath, renderConfigTemplate());

  const status: InitStatus = exists ? "overwritten" : "created";
  console.log(`${status === "created" ? "Created" : "Overwrote"} config at ${configPath}`);
  return { status, configPath };
}
