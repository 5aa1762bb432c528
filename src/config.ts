import { z } from "zod";
import type { GatewayConfig } from "./gateway/types.js";
import type { Logger, LogLevel } from "./logger.js";
import { ConfigError } from "./sdk/errors.js";
import type { LoadBalancerOptions } from "./sdk/types.js";

const csv = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((part) => part.trim())
      .filter(Boolean),
  );

const positiveMs = z.coerce.number().int().positive();

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  HOST: z.string().min(1).default("0.0.0.0"),
  UPSTREAMS: csv.optional(),
  LAG_TOLERANCE: z.coerce.number().int().min(0).default(7),
  LAG_THRESHOLD: z.coerce.number().int().min(1).default(3),
  FAILURE_WEIGHT: z.coerce.number().positive().default(2),
  BACKOFF_BASE_MS: positiveMs.default(5_000),
  BACKOFF_FACTOR: z.coerce.number().min(1).default(2),
  BACKOFF_MAX_MS: positiveMs.default(300_000),
  BACKOFF_WINDOW_MS: positiveMs.default(600_000),
  PROBE_FAILURE_PENALTY: z.coerce.number().min(0).default(0.5),
  STRAGGLER_TIMEOUT_MS: positiveMs.default(2_000),
  PROBE_INTERVAL_MS: positiveMs.default(10_000),
  PROBE_METHOD: z.string().min(1).default("getSlot"),
  REQUEST_TIMEOUT_MS: positiveMs.default(10_000),
  CALL_TIMEOUT_MS: positiveMs.default(5_000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  CORS_ORIGINS: csv.optional(),
  ALLOWED_METHODS: csv.optional(),
  TELEGRAM_BOT_TOKEN: z.string().min(1).optional(),
  TELEGRAM_CHAT_ID: z.string().min(1).optional(),
});

const upstreamsSchema = z
  .array(z.string().url())
  .min(1, "at least one upstream URL is required (UPSTREAMS or positional arguments)");

export interface AppConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  upstreams: string[];
  options: LoadBalancerOptions;
  corsOrigins?: string[];
  allowedMethods?: string[];
  telegram?: { botToken: string; chatId: string };
}

/**
 * Build the runtime configuration from CLI positionals
 * (`<PORT> <URL1> <URL2> ...`) and environment variables. Positionals win.
 */
export function loadConfig(
  argv: string[],
  env: Record<string, string | undefined>,
): AppConfig {
  const [portArg, ...urlArgs] = argv;
  const source: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      source[key] = value;
    }
  }
  if (portArg !== undefined) {
    source.PORT = portArg;
  }

  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }
  const values = parsed.data;

  const upstreams = upstreamsSchema.safeParse(urlArgs.length ? urlArgs : values.UPSTREAMS ?? []);
  if (!upstreams.success) {
    throw new ConfigError(formatIssues(upstreams.error, "upstreams"));
  }

  if (values.BACKOFF_MAX_MS < values.BACKOFF_BASE_MS) {
    throw new ConfigError(["BACKOFF_MAX_MS: must be >= BACKOFF_BASE_MS"]);
  }

  return {
    port: values.PORT,
    host: values.HOST,
    logLevel: values.LOG_LEVEL,
    upstreams: upstreams.data,
    options: {
      lagTolerance: values.LAG_TOLERANCE,
      lagThreshold: values.LAG_THRESHOLD,
      failureWeight: values.FAILURE_WEIGHT,
      backoffBaseMs: values.BACKOFF_BASE_MS,
      backoffFactor: values.BACKOFF_FACTOR,
      backoffMaxMs: values.BACKOFF_MAX_MS,
      backoffWindowMs: values.BACKOFF_WINDOW_MS,
      probeFailurePenalty: values.PROBE_FAILURE_PENALTY,
      stragglerTimeoutMs: values.STRAGGLER_TIMEOUT_MS,
      probeIntervalMs: values.PROBE_INTERVAL_MS,
      probeMethod: values.PROBE_METHOD,
      requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
      callTimeoutMs: values.CALL_TIMEOUT_MS,
    },
    corsOrigins: values.CORS_ORIGINS,
    allowedMethods: values.ALLOWED_METHODS,
    telegram:
      values.TELEGRAM_BOT_TOKEN && values.TELEGRAM_CHAT_ID
        ? { botToken: values.TELEGRAM_BOT_TOKEN, chatId: values.TELEGRAM_CHAT_ID }
        : undefined,
  };
}

/**
 * Gateway with a single catch-all route over the configured upstreams.
 */
export function toGatewayConfig(config: AppConfig, logger?: Logger): GatewayConfig {
  return {
    port: config.port,
    host: config.host,
    cors: config.corsOrigins ? { allowedOrigins: config.corsOrigins } : undefined,
    allowedMethods: config.allowedMethods,
    telegram: config.telegram,
    logger,
    routes: [
      {
        id: "default",
        endpoints: config.upstreams,
        options: config.options,
      },
    ],
  };
}

function formatIssues(error: z.ZodError, prefix?: string): string[] {
  return error.issues.map((issue) => {
    const path = [prefix, ...issue.path].filter((part) => part !== undefined).join(".");
    return `${path || "config"}: ${issue.message}`;
  });
}
