import { en, type Translations } from "./en.js";
import { ko } from "./ko.js";

export const SUPPORTED_LANGS = ["en", "ko"] as const;
export type Lang = typeof SUPPORTED_LANGS[number];

export const LOCALES: Record<Lang, Translations> = { en, ko };

export { en, ko, type Translations };
