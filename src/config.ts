import { z } from "zod";
import { ConfigurationError } from "./errors.js";

const positiveInt = (fallback: number) =>
  z.coerce.number().int().min(1).default(fallback);

const envSchema = z.object({
  LOG_LEVEL: z.enum(["error", "warn", "info", "http", "verbose", "debug", "silly"]).default("info"),
  FFMPEG_PATH: z.string().min(1).default("ffmpeg"),
  FFPROBE_PATH: z.string().min(1).default("ffprobe"),
  FFMPEG_TIMEOUT_MS: positiveInt(600_000),
  ANTHROPIC_API_KEY: z.string().optional(),
  DESCRIBE_MODEL: z.string().min(1).default("claude-sonnet-4-20250514"),
  DESCRIBE_PROMPT: z.string().min(1).default("Describe this image in no more than 150 characters"),
  DESCRIBE_MAX_TOKENS: positiveInt(200),
  DESCRIBE_CONCURRENCY: positiveInt(4),
  PIPELINE_CONCURRENCY: positiveInt(1),
});

export interface AppConfig {
  logLevel: string;
  ffmpegPath: string;
  ffprobePath: string;
  ffmpegTimeoutMs: number;
  anthropicApiKey?: string;
  describeModel: string;
  describePrompt: string;
  describeMaxTokens: number;
  describeConcurrency: number;
  pipelineConcurrency: number;
}

/**
 * Read configuration from the environment. Empty strings count as unset so
 * that `FOO= scene-digest ...` falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid environment configuration: ${details}`);
  }

  const e = parsed.data;
  return {
    logLevel: e.LOG_LEVEL,
    ffmpegPath: e.FFMPEG_PATH,
    ffprobePath: e.FFPROBE_PATH,
    ffmpegTimeoutMs: e.FFMPEG_TIMEOUT_MS,
    anthropicApiKey: e.ANTHROPIC_API_KEY,
    describeModel: e.DESCRIBE_MODEL,
    describePrompt: e.DESCRIBE_PROMPT,
    describeMaxTokens: e.DESCRIBE_MAX_TOKENS,
    describeConcurrency: e.DESCRIBE_CONCURRENCY,
    pipelineConcurrency: e.PIPELINE_CONCURRENCY,
  };
}

/** Parse a numeric CLI value that must lie in [0, 1]. */
export function parseUnitInterval(name: string, raw: string | number): number {
  const value = typeof raw === "number" ? raw : Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ConfigurationError(`${name} must be a number between 0.0 and 1.0 (got ${raw})`);
  }
  return value;
}

export function parsePositiveNumber(name: string, raw: string | number): number {
  const value = typeof raw === "number" ? raw : Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive number (got ${raw})`);
  }
  return value;
}

export function parsePositiveInt(name: string, raw: string | number): number {
  const value = parsePositiveNumber(name, raw);
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`${name} must be a positive integer (got ${raw})`);
  }
  return value;
}
