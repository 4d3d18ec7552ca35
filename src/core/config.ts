/**
 * Player configuration: read from the environment, validated with zod.
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";

const envBoolean = z.preprocess((value) => {
  if (typeof value !== "string") return value;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off", ""].includes(normalized)) return false;
  return value;
}, z.boolean());

const envList = z.preprocess((value) => {
  if (typeof value !== "string") return value;
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}, z.array(z.string().min(1)));

const milliseconds = z.coerce.number().int().positive();

export const PlayerConfigSchema = z.object({
  /** Name under which the local source is registered */
  localSourceName: z.string().min(1).default("local"),
  /** Initial volume, 0–100 */
  defaultVolume: z.coerce.number().min(0).max(100).default(70),
  /** Start in shuffle mode */
  shuffle: envBoolean.default(false),
  watchdogIntervalMs: milliseconds.default(100),
  positionReportIntervalMs: milliseconds.default(1_000),
  /** Polls made to confirm an outgoing source stopped before switching anyway */
  stopConfirmAttempts: z.coerce.number().int().min(0).default(5),
  stopConfirmIntervalMs: milliseconds.default(100),
  /** Maximum age of a remote source's self-reported playback before it is re-queried */
  remoteRefreshIntervalMs: z.coerce.number().int().min(0).default(2_000),
  /** Longest wait for a source to answer a command or a playback query */
  sourceCallTimeoutMs: milliseconds.default(1_000),
  /** Bound on every wait during shutdown */
  shutdownTimeoutMs: milliseconds.default(2_000),
  /** Pending deliveries per subscriber before events are dropped for it */
  subscriberQueueLimit: z.coerce.number().int().positive().default(100),
  autoLoadPlugins: envBoolean.default(false),
  enabledPlugins: envList.default([]),
});

export type PlayerConfig = z.infer<typeof PlayerConfigSchema>;
export type PlayerConfigInput = z.input<typeof PlayerConfigSchema>;

/** Validate `input`, filling defaults. Throws ConfigError listing every bad field. */
export function resolveConfig(input: PlayerConfigInput | Record<string, unknown> = {}): PlayerConfig {
  const result = PlayerConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid player configuration: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

/** Environment variable → config field. */
const ENV_KEYS: Record<string, keyof PlayerConfig> = {
  LOCAL_SOURCE_NAME: "localSourceName",
  DEFAULT_VOLUME: "defaultVolume",
  WATCHDOG_INTERVAL_MS: "watchdogIntervalMs",
  POSITION_REPORT_INTERVAL_MS: "positionReportIntervalMs",
  STOP_CONFIRM_ATTEMPTS: "stopConfirmAttempts",
  STOP_CONFIRM_INTERVAL_MS: "stopConfirmIntervalMs",
  REMOTE_REFRESH_INTERVAL_MS: "remoteRefreshIntervalMs",
  SOURCE_CALL_TIMEOUT_MS: "sourceCallTimeoutMs",
  SHUTDOWN_TIMEOUT_MS: "shutdownTimeoutMs",
  SUBSCRIBER_QUEUE_LIMIT: "subscriberQueueLimit",
  AUTO_LOAD_PLUGINS: "autoLoadPlugins",
  ENABLED_PLUGINS: "enabledPlugins",
};

/**
 * Build a config from environment variables. Unset variables fall back to
 * defaults; `DEFAULT_SORT=random` turns shuffle on.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): PlayerConfig {
  const input: Record<string, unknown> = {};
  for (const [variable, field] of Object.entries(ENV_KEYS)) {
    const value = env[variable];
    if (value !== undefined) input[field] = value;
  }
  if (env["DEFAULT_SORT"] !== undefined) {
    input["shuffle"] = env["DEFAULT_SORT"].trim().toLowerCase() === "random";
  }
  return resolveConfig(input);
}
