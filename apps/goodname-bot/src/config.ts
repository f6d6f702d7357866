/**
 * Bot configuration.
 *
 * Read from a JSON file (default: ./config.json), validated with zod, then
 * overlaid with environment variables:
 *
 *   DISCORD_BOT_TOKEN    Transport token (used when the file has none)
 *   LOG_LEVEL            fatal | error | warn | info | debug | trace | silent
 *   GOODNAME_DATA_FILE   Path of the good-names JSON document
 *   GOODNAME_SEASON      Season given to newly added names
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import {
  DEFAULT_RECONNECT_POLICY,
  LOG_LEVELS,
  type ApiCall,
  type LogLevel,
  type ReconnectPolicy,
} from "@goodname/chat-core";
import { DEFAULT_SEASON } from "@goodname/name-store";

export const DEFAULT_CONFIG_PATH = "config.json";
export const DEFAULT_DATA_FILE = "good_names.json";
export const ACTIONS_KEY = "actions";

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

// ── Schema ───────────────────────────────────────────────────────────

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

const triggerConfigSchema = z.object({
  trigger: z.string().min(1).refine(isValidPattern, "not a valid regular expression"),
  action: z.string().min(1),
});

const apiCallSchema = z.discriminatedUnion("method", [
  z.object({ method: z.literal("postMessage"), channel: z.string().min(1), text: z.string() }),
  z.object({ method: z.literal("fetchChannel"), channel: z.string().min(1) }),
  z.object({ method: z.literal("whoami") }),
]);

const logLevelSchema = z.enum(LOG_LEVELS);

const configFileSchema = z.object({
  token: z.string().min(1).optional(),
  actions: z.array(triggerConfigSchema),
  debug_calls: z.array(apiCallSchema).default([]),
  data_file: z.string().min(1).optional(),
  season: z.string().min(1).optional(),
  log_level: logLevelSchema.optional(),
  poll_interval_ms: z.number().int().positive().optional(),
  reconnect: z
    .object({
      attempts: z.number().int().positive().optional(),
      min_delay_ms: z.number().int().nonnegative().optional(),
      max_delay_ms: z.number().int().positive().optional(),
      jitter: z.number().min(0).max(1).optional(),
    })
    .optional(),
});

export type TriggerConfig = z.infer<typeof triggerConfigSchema>;

export interface BotConfig {
  token: string;
  /** Ordered trigger bindings */
  actions: TriggerConfig[];
  /** API calls issued once after connecting */
  debugCalls: ApiCall[];
  dataFile: string;
  season: string;
  logLevel: LogLevel;
  pollIntervalMs: number;
  reconnect: ReconnectPolicy;
}

// ── Loading ──────────────────────────────────────────────────────────

/** Validate a parsed config document and apply environment overrides. */
export function parseBotConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): BotConfig {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new ConfigError("Config must be a JSON object");
  }
  if (!(ACTIONS_KEY in raw)) {
    throw new ConfigError(`Config did not contain a value for key: ${ACTIONS_KEY}`);
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config: ${issues}`);
  }
  const file = parsed.data;

  const token = file.token ?? env.DISCORD_BOT_TOKEN;
  if (!token) {
    throw new ConfigError("No transport token: set \"token\" in the config or DISCORD_BOT_TOKEN");
  }

  let logLevel: LogLevel = file.log_level ?? "info";
  if (env.LOG_LEVEL) {
    const level = logLevelSchema.safeParse(env.LOG_LEVEL);
    if (!level.success) {
      throw new ConfigError(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(", ")}`);
    }
    logLevel = level.data;
  }

  const reconnect = file.reconnect;

  return {
    token,
    actions: file.actions,
    debugCalls: file.debug_calls,
    dataFile: path.resolve(env.GOODNAME_DATA_FILE ?? file.data_file ?? DEFAULT_DATA_FILE),
    season: env.GOODNAME_SEASON ?? file.season ?? DEFAULT_SEASON,
    logLevel,
    pollIntervalMs: file.poll_interval_ms ?? 1_000,
    reconnect: {
      attempts: reconnect?.attempts ?? DEFAULT_RECONNECT_POLICY.attempts,
      minDelayMs: reconnect?.min_delay_ms ?? DEFAULT_RECONNECT_POLICY.minDelayMs,
      maxDelayMs: reconnect?.max_delay_ms ?? DEFAULT_RECONNECT_POLICY.maxDelayMs,
      jitter: reconnect?.jitter ?? DEFAULT_RECONNECT_POLICY.jitter,
    },
  };
}

/** Read, parse and validate the config file. Throws ConfigError. */
export function loadBotConfig(
  configPath: string = DEFAULT_CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env,
): BotConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Could not read config ${configPath}: ${reason}`, { cause: err });
  }
  return parseBotConfig(raw, env);
}

// ── CLI ──────────────────────────────────────────────────────────────

export interface CliArgs {
  configPath: string;
  help: boolean;
}

export const USAGE = `Usage: goodname-bot [-c <config.json>]

Runs the good name alert bot against a Discord channel.

Options:
  -c, --config <path>  The configuration file to use (default: ${DEFAULT_CONFIG_PATH})
  -h, --help           Show this help`;

export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = { configPath: DEFAULT_CONFIG_PATH, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "-h" || arg === "--help") {
      args.help = true;
    } else if (arg === "-c" || arg === "--config") {
      const value = argv[++i];
      if (!value) throw new ConfigError(`${arg} needs a path`);
      args.configPath = value;
    } else if (arg.startsWith("--config=")) {
      args.configPath = arg.slice("--config=".length);
    } else {
      throw new ConfigError(`Unknown argument: ${arg}`);
    }
  }

  return args;
}
