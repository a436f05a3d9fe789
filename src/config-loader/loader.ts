import { readFile } from "node:fs/promises";
import yaml from "js-yaml";
import { parsePipelineConfig, type PipelineConfig } from "./schema.js";
import { DEFAULT_CONFIG } from "../config/defaults.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "config-loader" });

export async function loadPipelineConfig(path: string): Promise<PipelineConfig> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err) {
    if (isNotFound(err)) {
      log.debug({ path }, "No pipeline config found, using defaults");
      return DEFAULT_CONFIG;
    }
    log.warn({ err, path }, "Failed to read pipeline config, using defaults");
    return DEFAULT_CONFIG;
  }

  try {
    const config = parsePipelineConfig(yaml.load(content));
    // File values override defaults section by section
    return mergeConfigs(DEFAULT_CONFIG, config);
  } catch (err) {
    log.warn({ err, path }, "Invalid pipeline config, using defaults");
    return DEFAULT_CONFIG;
  }
}

export function mergeConfigs(
  defaults: PipelineConfig,
  overrides: PipelineConfig
): PipelineConfig {
  return {
    workers: { ...defaults.workers, ...overrides.workers },
    github: { ...defaults.github, ...overrides.github },
    extraction: { ...defaults.extraction, ...overrides.extraction },
    retention: { ...defaults.retention, ...overrides.retention },
  };
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
