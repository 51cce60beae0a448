import * as os from "os";
import * as dotenv from "dotenv";
import { ConfigurationError } from "./errors";
import { ScoreMode } from "./types";
import { DEFAULT_JOB_TIMEOUT_MS } from "./constants";

dotenv.config();

export interface GraderConfig {
  /** Number of sandboxes allowed to run at once */
  concurrency: number;
  /** Leave sandboxes in place after grading for inspection */
  keepAlive: boolean;
  /** Capture and print each sandbox's console output */
  debug: boolean;
  verbose: boolean;
  timeoutMs: number;
  scoreMode: ScoreMode;
  /** Command line run inside each sandbox; defaults to the bundled grader */
  sandboxCommand?: string;
  captureArtifacts: boolean;
  /** Where sandbox directories are created; defaults to the OS temp dir */
  workDir?: string;
}

type Env = Record<string, string | undefined>;

function parseBoolean(name: string, raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(value)) return true;
  if (["0", "false", "no", "off"].includes(value)) return false;
  throw new ConfigurationError(`${name} must be a boolean, got "${raw}"`);
}

function parsePositiveInteger(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function parseScoreMode(raw: string | undefined): ScoreMode {
  if (raw === undefined || raw.trim() === "") return "fraction";
  const value = raw.trim().toLowerCase();
  if (value === "fraction" || value === "points") return value;
  throw new ConfigurationError(
    `GRADER_SCORE_MODE must be "fraction" or "points", got "${raw}"`
  );
}

export function defaultConcurrency(): number {
  // Leave one core free
  return Math.max(1, os.cpus().length - 1);
}

/**
 * Validates a config assembled from code rather than the environment
 */
export function validateConfig(config: GraderConfig): GraderConfig {
  if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
    throw new ConfigurationError(
      `concurrency must be a positive integer, got ${config.concurrency}`
    );
  }
  if (!Number.isFinite(config.timeoutMs) || config.timeoutMs <= 0) {
    throw new ConfigurationError(`timeoutMs must be positive, got ${config.timeoutMs}`);
  }
  return config;
}

/**
 * Reads GRADER_* variables (after .env has been loaded) and applies overrides
 */
export function loadConfig(
  overrides: Partial<GraderConfig> = {},
  env: Env = process.env
): GraderConfig {
  const config: GraderConfig = {
    concurrency: parsePositiveInteger(
      "GRADER_CONCURRENCY",
      env.GRADER_CONCURRENCY,
      defaultConcurrency()
    ),
    keepAlive: parseBoolean("GRADER_KEEP_ALIVE", env.GRADER_KEEP_ALIVE, false),
    debug: parseBoolean("GRADER_DEBUG", env.GRADER_DEBUG, false),
    verbose: parseBoolean("GRADER_VERBOSE", env.GRADER_VERBOSE, false),
    timeoutMs: parsePositiveInteger(
      "GRADER_TIMEOUT_MS",
      env.GRADER_TIMEOUT_MS,
      DEFAULT_JOB_TIMEOUT_MS
    ),
    scoreMode: parseScoreMode(env.GRADER_SCORE_MODE),
    sandboxCommand: env.GRADER_SANDBOX_COMMAND || undefined,
    captureArtifacts: parseBoolean(
      "GRADER_CAPTURE_ARTIFACTS",
      env.GRADER_CAPTURE_ARTIFACTS,
      false
    ),
    workDir: env.GRADER_WORK_DIR || undefined,
  };

  const merged: GraderConfig = { ...config };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value });
    }
  }
  return validateConfig(merged);
}
