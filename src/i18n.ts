import { LOCALES, SUPPORTED_LANGS, en, type Lang, type Translations } from "./locales/index.js";

let _current: Translations = en;

export function isLang(value: string): value is Lang {
  return SUPPORTED_LANGS.some((lang) => lang === value);
}

export function setLang(lang: string): { ok: boolean; message: string } {
  if (!isLang(lang)) {
    return {
      ok: false,
      message: `${_current.lang_unknown}: ${lang}. ${_current.lang_available}: ${SUPPORTED_LANGS.join(", ")}`,
    };
  }
  _current = LOCALES[lang];
  return { ok: true, message: `${_current.lang_set_to} ${lang}` };
}

export function t(key: keyof Translations): string {
  return _current[key];
}

