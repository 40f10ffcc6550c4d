import type { Config } from "../config.js";
import { CONFIG_PATH, type ToolDef } from "../types.js";
import { createConfigTool } from "./config.js";
import { jq } from "./jq.js";
import { regex2json } from "./regex2json.js";
import { createTogchat, type FetchLike } from "./togchat.js";
import { yq } from "./yq.js";

export interface ToolDeps {
  config: Config;
  configPath?: string;
  fetch?: FetchLike;
}

export function createTools(deps: ToolDeps): ToolDef[] {
  return [
    createConfigTool(deps.configPath ?? CONFIG_PATH),
    jq,
    regex2json,
    createTogchat({ webhook: deps.config.chatWebhook, fetch: deps.fetch ?? fetch }),
    yq,
  ];
}
