// ─── Pipeline Config Loader ──────────────────────────────────────────────────
//
// Reads a pipeline config .json file, validates it with Zod, and returns a
// typed PipelineConfig with every default filled in.
// ─────────────────────────────────────────────────────────────────────────────

import { existsSync, readFileSync } from "node:fs";
import { ChirpError } from "../chirp/errors.js";
import { PipelineConfigSchema, type PipelineConfig } from "./schema.js";

/**
 * Validate an already-parsed config object.
 *
 * @throws ChirpError InvalidConfig listing every issue.
 */
export function parsePipelineConfig(raw: unknown, source = "config"): PipelineConfig {
  const result = PipelineConfigSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.issues
      .map(i => `  ${i.path.join(".") || "root"}: ${i.message}`)
      .join("\n");
    throw new ChirpError("InvalidConfig", `Invalid ${source}:\n${issues}`);
  }

  return result.data;
}

/**
 * Load and validate a pipeline config file.
 *
 * @throws ChirpError InvalidConfig if the file is missing, is not JSON, or
 *   fails validation.
 */
export function loadPipelineConfig(filePath: string): PipelineConfig {
  if (!existsSync(filePath)) {
    throw new ChirpError("InvalidConfig", `Config not found: ${filePath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf8"));
  } catch (err) {
    throw new ChirpError(
      "InvalidConfig",
      `Config ${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  return parsePipelineConfig(raw, `config ${filePath}`);
}
