import { BuiltinError, errorMessage } from "../errors.js";
import { readAll } from "../io.js";
import { debug } from "../log.js";
import type { ToolDef } from "../types.js";

export interface ChatResponse {
  ok: boolean;
  status: number;
  statusText: string;
}

export type FetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string }
) => Promise<ChatResponse>;

export interface TogchatDeps {
  webhook?: string;
  fetch: FetchLike;
}

const USAGE = "usage: togchat [--webhook URL] [MESSAGE...]";

/** Posts a message (arguments, else stdin) to a Google Chat incoming webhook. */
export function createTogchat(deps: TogchatDeps): ToolDef {
  return {
    name: "togchat",
    description: "Send a message to a Google Chat webhook",
    async run(ctx, args) {
      let webhook = deps.webhook;
      const words: string[] = [];
      for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === "--webhook") {
          webhook = args[++i];
          if (webhook === undefined) throw new BuiltinError(USAGE, 2);
        } else if (arg.startsWith("--webhook=")) {
          webhook = arg.slice("--webhook=".length);
        } else {
          words.push(arg);
        }
      }
      if (!webhook) throw new BuiltinError("no webhook configured (use --webhook or set chatWebhook)", 2);

      const text = words.length > 0 ? words.join(" ") : (await readAll(ctx.stdin)).trimEnd();
      if (text === "") throw new BuiltinError("nothing to send", 2);

      let response: ChatResponse;
      try {
        response = await deps.fetch(webhook, {
          method: "POST",
          headers: { "Content-Type": "application/json; charset=UTF-8" },
          body: JSON.stringify({ text }),
        });
      } catch (err) {
        throw new BuiltinError(`request failed: ${errorMessage(err)}`);
      }
      debug("togchat", { status: response.status });
      if (!response.ok) {
        throw new BuiltinError(`webhook returned ${response.status} ${response.statusText}`.trimEnd());
      }
    },
  };
}
