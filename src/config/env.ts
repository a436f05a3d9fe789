import { z } from "zod";

const envSchema = z.object({
  // GitHub REST API
  GITHUB_TOKEN: z.string().min(1).optional(),
  GITHUB_API_BASE_URL: z.string().url().default("https://api.github.com"),

  // Anthropic (enables the model extraction tier)
  ANTHROPIC_API_KEY: z.string().min(1).optional(),

  // PostgreSQL (in-memory store when unset)
  POSTGRES_URL: z.string().optional(),

  // Pipeline tuning file
  PIPELINE_CONFIG_PATH: z.string().default("rules-miner.yml"),

  // Server
  PORT: z.coerce.number().default(3000),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  if (_env) return _env;

  // Empty strings from .env templates count as unset
  const raw = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== "")
  );

  const result = envSchema.safeParse(raw);
  if (!result.success) {
    const missing = result.error.issues
      .map((i) => `  ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid environment variables:\n${missing}`);
  }

  _env = result.data;
  return _env;
}

export function resetEnvCache(): void {
  _env = null;
}
