import { type Translations } from "./en.js";

export const ko: Translations = {
  // shell.ts — interactive banner
  welcome_subtitle: " — 내장 도구 + 시스템 명령",
  welcome_hint:     "help 로 내장 명령 보기, exit 또는 Ctrl+D 로 종료",
  goodbye:          "안녕히 가세요.",
  // builtins — help
  help_header:           "── toolbelt 셸 ──",
  help_builtins_section: "셸 내장 명령:",
  help_tools_section:    "도구 (같은 이름의 외부 명령보다 우선):",
  help_external_hint:    "그 밖의 명령은 외부 프로그램으로 실행됩니다.",
  // cli.ts — printHelp
  cli_title:       "toolbelt — 멀티콜 유틸리티",
  cli_usage:       "사용법:",
  cli_shell:       "대화형 셸, 스크립트 파일, 파이프 스크립트 또는 -c 문자열",
  cli_tool:        "단일 도구 실행",
  cli_help:        "도움말 표시",
  cli_version:     "버전 표시",
  cli_tools:       "도구:",
  // config tool
  config_saved:    "저장됨",
  config_removed:  "삭제됨",
  // lang messages
  lang_set_to:    "언어 설정:",
  lang_unknown:   "알 수 없는 언어",
  lang_available: "사용 가능",
};
