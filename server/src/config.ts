/**
 * Gateway process configuration.
 *
 * Sources, later ones winning: built-in defaults, the JSON file at
 * CONFIG_PATH, environment variables. The merged result is validated once.
 *
 * Env: NATS_URL, SERVICE_NAME, SUBJECT_PREFIX, HTTP_HOST, HTTP_PORT,
 * STORAGE_PATH, ACK_TIMEOUT_MS, RESET_TIMEOUT_MS, LOG_LEVEL, CONFIG_PATH.
 */

import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import { GatewayError, describeIssues, errorMessage } from "@shelflight/core";
import { MAX_TIMER_DELAY_MS, type Logger } from "@shelflight/gateway";

const LOG_PREFIX = "shelf-gateway:config";

export const GatewayProcessConfigSchema = z.object({
  /** NATS server URL */
  natsUrl: z.string().min(1).default("nats://127.0.0.1:4222"),
  /** Service / NATS connection name */
  serviceName: z.string().min(1).default("shelf-gateway"),
  /** First token(s) of every device subject */
  subjectPrefix: z
    .string()
    .regex(/^[^.*>\s]+(\.[^.*>\s]+)*$/, "must be one or more dot-separated subject tokens")
    .default("pbl"),
  httpHost: z.string().min(1).default("127.0.0.1"),
  httpPort: z.coerce.number().int().min(0).max(65_535).default(8000),
  /** JSON file holding shelves and devices */
  storagePath: z.string().min(1).default("./data/db.json"),
  /** Wait for ordinary light/config acks */
  ackTimeoutMs: z.coerce.number().int().positive().max(MAX_TIMER_DELAY_MS).default(5_000),
  /** Wait for a device reset, which clears the device's storage */
  resetTimeoutMs: z.coerce.number().int().positive().max(MAX_TIMER_DELAY_MS).default(25_000),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type GatewayProcessConfig = z.infer<typeof GatewayProcessConfigSchema>;

const ENV_KEYS: Record<string, keyof GatewayProcessConfig> = {
  NATS_URL: "natsUrl",
  SERVICE_NAME: "serviceName",
  SUBJECT_PREFIX: "subjectPrefix",
  HTTP_HOST: "httpHost",
  HTTP_PORT: "httpPort",
  STORAGE_PATH: "storagePath",
  ACK_TIMEOUT_MS: "ackTimeoutMs",
  RESET_TIMEOUT_MS: "resetTimeoutMs",
  LOG_LEVEL: "logLevel",
};

const FileConfigSchema = z.record(z.unknown());

function readConfigFile(configPath: string, log: Logger): Record<string, unknown> {
  if (!existsSync(configPath)) {
    log.warn?.({ configPath }, `${LOG_PREFIX}:loadConfig - Config file not found`);
    return {};
  }
  try {
    const parsed = FileConfigSchema.safeParse(JSON.parse(readFileSync(configPath, "utf-8")));
    if (!parsed.success) {
      log.error?.({ configPath }, `${LOG_PREFIX}:loadConfig - Config file is not a JSON object`);
      return {};
    }
    log.info?.({ configPath, keys: Object.keys(parsed.data).length }, `${LOG_PREFIX}:loadConfig - Loaded config from file`);
    return parsed.data;
  } catch (err) {
    log.error?.({ configPath, error: errorMessage(err) }, `${LOG_PREFIX}:loadConfig - Failed to load config file`);
    return {};
  }
}

/**
 * Load and validate the process configuration.
 *
 * @throws GatewayError VALIDATION_ERROR when a value is out of range
 */
export function loadConfig(params: { env?: NodeJS.ProcessEnv; log?: Logger } = {}): GatewayProcessConfig {
  const env = params.env ?? process.env;
  const log = params.log ?? console;

  const fromFile = env.CONFIG_PATH ? readConfigFile(env.CONFIG_PATH, log) : {};
  const fromEnv: Record<string, string> = {};
  for (const [name, key] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value !== undefined && value !== "") fromEnv[key] = value;
  }

  const parsed = GatewayProcessConfigSchema.safeParse({ ...fromFile, ...fromEnv });
  if (!parsed.success) {
    throw new GatewayError({
      code: "VALIDATION_ERROR",
      message: `${LOG_PREFIX}:loadConfig - Invalid configuration: ${describeIssues(parsed.error)}`,
      details: parsed.error.flatten(),
    });
  }
  return parsed.data;
}
