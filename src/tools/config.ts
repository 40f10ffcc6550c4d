import { green } from "../ansi.js";
import {
  CONFIG_KEYS,
  coerceConfigValue,
  isConfigKey,
  loadConfig,
  readConfigFile,
  validateConfig,
  writeConfigFile,
  type ConfigKey,
} from "../config.js";
import { BuiltinError } from "../errors.js";
import { setLang, t } from "../i18n.js";
import type { CommandContext, ToolDef } from "../types.js";

const USAGE = "usage: config [path|list|get KEY|set KEY VALUE|unset KEY]";

function requireKey(key: string | undefined): ConfigKey {
  if (key === undefined) throw new BuiltinError(USAGE, 2);
  if (!isConfigKey(key)) {
    throw new BuiltinError(`unknown key: ${key} (one of ${CONFIG_KEYS.join(", ")})`, 2);
  }
  return key;
}

function effective(ctx: CommandContext, path: string) {
  return loadConfig({ path, env: ctx.env });
}

export function createConfigTool(path: string): ToolDef {
  return {
    name: "config",
    description: "Show or edit the toolbelt config file",
    run(ctx, args) {
      const [action = "list", ...rest] = args;
      switch (action) {
        case "path":
          ctx.stdout.write(path + "\n");
          return;
        case "list": {
          const config = effective(ctx, path);
          for (const key of CONFIG_KEYS) {
            const value = config[key];
            if (value !== undefined) ctx.stdout.write(`${key}=${value}\n`);
          }
          return;
        }
        case "get": {
          const key = requireKey(rest[0]);
          const value = effective(ctx, path)[key];
          if (value === undefined) throw new BuiltinError(`${key} is not set`);
          ctx.stdout.write(`${value}\n`);
          return;
        }
        case "set": {
          const key = requireKey(rest[0]);
          const raw = rest[1];
          if (raw === undefined || rest.length > 2) throw new BuiltinError(USAGE, 2);
          const values = { ...readConfigFile(path), [key]: coerceConfigValue(key, raw) };
          validateConfig(values);
          writeConfigFile(values, path);
          const message = key === "lang" ? setLang(raw).message : `${t("config_saved")}: ${key}`;
          ctx.stderr.write(`${green("✓")} ${message}\n`);
          return;
        }
        case "unset": {
          const key = requireKey(rest[0]);
          const values = readConfigFile(path);
          delete values[key];
          validateConfig(values);
          writeConfigFile(values, path);
          ctx.stderr.write(`${green("✓")} ${t("config_removed")}: ${key}\n`);
          return;
        }
        default:
          throw new BuiltinError(`unknown action: ${action}\n${USAGE}`, 2);
      }
    },
  };
}
