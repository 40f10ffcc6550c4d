/**
 * Configuration loading
 *
 * Priority:
 * 1. Environment variables
 * 2. Config file (~/.config/toolbelt/config.json)
 * 3. Default values
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import { ErrorCode, ToolbeltError, errorMessage } from "./errors.js";
import { SUPPORTED_LANGS } from "./locales/index.js";
import {
  CONFIG_PATH,
  DEFAULT_MAX_LOOP_ITERATIONS,
  DEFAULT_MAX_OUTPUT_BYTES,
  DEFAULT_MAX_PENDING_SOURCE,
} from "./types.js";

export const ConfigSchema = z
  .object({
    maxOutputBytes: z.number().int().positive().default(DEFAULT_MAX_OUTPUT_BYTES),
    maxPendingSource: z.number().int().positive().default(DEFAULT_MAX_PENDING_SOURCE),
    maxLoopIterations: z.number().int().positive().default(DEFAULT_MAX_LOOP_ITERATIONS),
    prompt: z.string().default("tb > "),
    continuationPrompt: z.string().default("> "),
    chatWebhook: z.string().url().optional(),
    lang: z.enum(SUPPORTED_LANGS).default("en"),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigKey = keyof Config;

const ConfigKeySchema = ConfigSchema.keyof();
export const CONFIG_KEYS: readonly ConfigKey[] = ConfigKeySchema.options;

const NUMERIC_KEYS: ReadonlySet<string> = new Set([
  "maxOutputBytes",
  "maxPendingSource",
  "maxLoopIterations",
]);

export function isConfigKey(key: string): key is ConfigKey {
  return ConfigKeySchema.safeParse(key).success;
}

/**
 * Read the raw config file. A missing file is an empty config; a file that is
 * not a JSON object is an error.
 */
export function readConfigFile(path: string = CONFIG_PATH): Record<string, unknown> {
  if (!existsSync(path)) return {};
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ToolbeltError(ErrorCode.CONFIG_INVALID, `cannot read config ${path}: ${errorMessage(err)}`, { path });
  }
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new ToolbeltError(ErrorCode.CONFIG_INVALID, `config ${path} must contain a JSON object`, { path });
  }
  return { ...raw };
}

export function writeConfigFile(values: Record<string, unknown>, path: string = CONFIG_PATH): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(values, null, 2) + "\n", "utf-8");
}

function loadEnvConfig(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  if (env.TOOLBELT_MAX_OUTPUT_BYTES) {
    config.maxOutputBytes = Number(env.TOOLBELT_MAX_OUTPUT_BYTES);
  }
  if (env.TOOLBELT_PROMPT) {
    config.prompt = env.TOOLBELT_PROMPT;
  }
  if (env.TOOLBELT_GCHAT_WEBHOOK) {
    config.chatWebhook = env.TOOLBELT_GCHAT_WEBHOOK;
  }
  if (env.TOOLBELT_LANG) {
    config.lang = env.TOOLBELT_LANG;
  }

  return config;
}

export function validateConfig(values: Record<string, unknown>): Config {
  const result = ConfigSchema.safeParse(values);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join(".") : "config";
    throw new ToolbeltError(ErrorCode.CONFIG_INVALID, `invalid config: ${where}: ${issue.message}`, {
      issues: result.error.issues,
    });
  }
  return result.data;
}

export function loadConfig(
  options: { path?: string; env?: NodeJS.ProcessEnv } = {}
): Config {
  const fileConfig = readConfigFile(options.path);
  const envConfig = loadEnvConfig(options.env ?? process.env);
  return validateConfig({ ...fileConfig, ...envConfig });
}

// Values typed on a command line arrive as strings
export function coerceConfigValue(key: ConfigKey, value: string): string | number {
  return NUMERIC_KEYS.has(key) ? Number(value) : value;
}
