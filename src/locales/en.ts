export const en = {
  // shell.ts — interactive banner
  welcome_subtitle: " — builtin tools + system commands",
  welcome_hint:     "Type help for builtins, exit or Ctrl+D to leave",
  goodbye:          "Bye.",
  // builtins — help
  help_header:           "── toolbelt shell ──",
  help_builtins_section: "Shell builtins:",
  help_tools_section:    "Tools (shadow external commands of the same name):",
  help_external_hint:    "Any other command runs as an external program.",
  // cli.ts — printHelp
  cli_title:       "toolbelt — multicall utilities",
  cli_usage:       "Usage:",
  cli_shell:       "Interactive shell, script file, piped script or -c string",
  cli_tool:        "Run a single tool",
  cli_help:        "Show this help",
  cli_version:     "Show version",
  cli_tools:       "Tools:",
  // config tool
  config_saved:    "Saved",
  config_removed:  "Removed",
  // lang messages
  lang_set_to:    "Language set to",
  lang_unknown:   "Unknown language",
  lang_available: "Available",
} as const;

export type Translations = { [K in keyof typeof en]: string };
