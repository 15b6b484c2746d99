import { z } from "zod";

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
  // Logs go here instead of stderr; the terminal owns stdout while the board is up
  LOG_FILE: z.string().optional(),
  SCOREBOARD_API_BASE: z.string().url().optional(),
  SCOREBOARD_USER_AGENT: z.string().optional(),
  SCOREBOARD_REFRESH_INTERVAL_MS: z.string().optional(),
  SCOREBOARD_BACKOFF_MAX_MS: z.string().optional(),
  SCOREBOARD_FETCH_TIMEOUT_MS: z.string().optional(),
  SCOREBOARD_FETCH_MAX_RETRIES: z.string().optional(),
  SCOREBOARD_TICK_MS: z.string().optional(),
});

const parsed = EnvSchema.safeParse(process.env);

if (!parsed.success) {
  throw new Error(`Invalid environment variables: ${parsed.error.message}`);
}

const env = parsed.data;

const BOUNDS = {
  REFRESH_MIN_MS: 5_000,
  REFRESH_MAX_MS: 600_000, // 10m
  BACKOFF_MIN_MS: 10_000,
  BACKOFF_MAX_MS: 3_600_000, // 1h
  TIMEOUT_MIN_MS: 1_000,
  TIMEOUT_MAX_MS: 60_000,
  RETRIES_MIN: 1,
  RETRIES_MAX: 5,
  TICK_MIN_MS: 100,
  TICK_MAX_MS: 5_000,
} as const;

function parseBoundedInt(
  val: string | undefined,
  {
    defaultValue,
    min,
    max,
    name,
  }: { defaultValue: number; min: number; max: number; name: string }
): number {
  const raw = parseInt(val ?? "", 10);
  if (!Number.isFinite(raw)) return defaultValue;
  if (raw < min) {
    console.warn(`${name} too low (${raw}). Clamping to minimum ${min}.`);
    return min;
  }
  if (raw > max) {
    console.warn(`${name} too high (${raw}). Clamping to maximum ${max}.`);
    return max;
  }
  return raw;
}

export const config = {
  isTest: env.NODE_ENV === "test",
  logFile: env.LOG_FILE,
  logLevel: env.LOG_LEVEL ?? (env.LOG_FILE ? "info" : "silent"),
  apiBase: (env.SCOREBOARD_API_BASE ?? "https://site.api.espn.com/apis/site/v2/sports").replace(/\/+$/, ""),
  userAgent: env.SCOREBOARD_USER_AGENT ?? "scoreline/0.1.0",
  refreshIntervalMs: parseBoundedInt(env.SCOREBOARD_REFRESH_INTERVAL_MS, {
    defaultValue: 30_000,
    min: BOUNDS.REFRESH_MIN_MS,
    max: BOUNDS.REFRESH_MAX_MS,
    name: "SCOREBOARD_REFRESH_INTERVAL_MS",
  }),
  backoffCeilingMs: parseBoundedInt(env.SCOREBOARD_BACKOFF_MAX_MS, {
    defaultValue: 300_000,
    min: BOUNDS.BACKOFF_MIN_MS,
    max: BOUNDS.BACKOFF_MAX_MS,
    name: "SCOREBOARD_BACKOFF_MAX_MS",
  }),
  fetchTimeoutMs: parseBoundedInt(env.SCOREBOARD_FETCH_TIMEOUT_MS, {
    defaultValue: 10_000,
    min: BOUNDS.TIMEOUT_MIN_MS,
    max: BOUNDS.TIMEOUT_MAX_MS,
    name: "SCOREBOARD_FETCH_TIMEOUT_MS",
  }),
  fetchMaxRetries: parseBoundedInt(env.SCOREBOARD_FETCH_MAX_RETRIES, {
    defaultValue: 1,
    min: BOUNDS.RETRIES_MIN,
    max: BOUNDS.RETRIES_MAX,
    name: "SCOREBOARD_FETCH_MAX_RETRIES",
  }),
  tickMs: parseBoundedInt(env.SCOREBOARD_TICK_MS, {
    defaultValue: 500,
    min: BOUNDS.TICK_MIN_MS,
    max: BOUNDS.TICK_MAX_MS,
    name: "SCOREBOARD_TICK_MS",
  }),
} as const;
