import { afterEach, describe, it, expect } from "vitest";
import { fileURLToPath } from "node:url";
import yaml from "js-yaml";
import { parsePipelineConfig } from "../../src/config-loader/schema.js";
import { loadPipelineConfig } from "../../src/config-loader/loader.js";
import { DEFAULT_CONFIG } from "../../src/config/defaults.js";
import { loadEnv, resetEnvCache } from "../../src/config/env.js";

const fixture = (name: string) => fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));

describe("pipeline config schema", () => {
  it("fills every section with defaults", () => {
    expect(parsePipelineConfig({})).toEqual(DEFAULT_CONFIG);
    expect(parsePipelineConfig(undefined)).toEqual(DEFAULT_CONFIG);
  });

  it("parses YAML overrides", () => {
    const config = parsePipelineConfig(yaml.load("workers:\n  count: 2\ngithub:\n  perPage: 50\n"));

    expect(config.workers).toEqual({ count: 2, pollTimeoutMs: 1000, shutdownTimeoutMs: 5000 });
    expect(config.github.perPage).toBe(50);
    expect(config.github.maxPullRequests).toBe(1000);
  });

  it("rejects a page size above the API cap", () => {
    expect(() => parsePipelineConfig({ github: { perPage: 250 } })).toThrow();
  });

  it("rejects an invalid temperature", () => {
    expect(() => parsePipelineConfig({ extraction: { temperature: 2 } })).toThrow();
  });
});

describe("loadPipelineConfig", () => {
  it("merges the file over the defaults", async () => {
    const config = await loadPipelineConfig(fixture("rules-miner.yml"));

    expect(config.workers).toEqual({ count: 8, pollTimeoutMs: 250, shutdownTimeoutMs: 5000 });
    expect(config.github).toEqual({
      perPage: 100,
      requestDelayMs: 50,
      fallbackWaitMs: 60_000,
      maxPullRequests: 200,
    });
    expect(config.extraction.llmEnabled).toBe(false);
    expect(config.extraction.model).toBe(DEFAULT_CONFIG.extraction.model);
    expect(config.retention.days).toBe(14);
  });

  it("uses defaults when the file is missing", async () => {
    expect(await loadPipelineConfig(fixture("does-not-exist.yml"))).toEqual(DEFAULT_CONFIG);
  });

  it("uses defaults when the file is invalid", async () => {
    expect(await loadPipelineConfig(fixture("invalid-config.yml"))).toEqual(DEFAULT_CONFIG);
  });
});

describe("loadEnv", () => {
  afterEach(() => resetEnvCache());

  it("applies defaults and treats empty values as unset", () => {
    const env = loadEnv({ GITHUB_TOKEN: "", POSTGRES_URL: "", PORT: "8080" });

    expect(env.GITHUB_TOKEN).toBeUndefined();
    expect(env.POSTGRES_URL).toBeUndefined();
    expect(env.PORT).toBe(8080);
    expect(env.GITHUB_API_BASE_URL).toBe("https://api.github.com");
    expect(env.PIPELINE_CONFIG_PATH).toBe("rules-miner.yml");
  });

  it("caches the first result until reset", () => {
    const first = loadEnv({ GITHUB_TOKEN: "test-token" });

    expect(loadEnv({})).toBe(first);
    resetEnvCache();
    expect(loadEnv({}).GITHUB_TOKEN).toBeUndefined();
  });

  it("reports invalid variables", () => {
    expect(() => loadEnv({ LOG_LEVEL: "loud" })).toThrow(/LOG_LEVEL/);
  });
});
