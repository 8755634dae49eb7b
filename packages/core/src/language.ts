// packages/core/src/language.ts
import { extractKeywords, LANGUAGES, type Language } from "@avatar-support/knowledge";
import lexicon from "./lexicon.json";

export type LanguageTag = Language | "auto";

const EN: ReadonlySet<string> = new Set(lexicon.en);
const ES: ReadonlySet<string> = new Set(lexicon.es);

// ortografía que sólo aparece en español
const SPANISH_MARKS = /[¿¡ñáéíóúü]/gi;

function isLanguage(v: string): v is Language {
  return LANGUAGES.some((l) => l === v);
}

/** "es", "ES", "es-MX", "es_AR" -> "es"; cualquier otra cosa -> null */
export function parseLanguageTag(tag: unknown): Language | null {
  if (typeof tag !== "string") return null;
  const base = tag.trim().toLowerCase().split(/[-_]/)[0] ?? "";
  return isLanguage(base) ? base : null;
}

export function detectLanguage(text: string): { language: Language; scores: Record<Language, number> } {
  const tokens = extractKeywords(text);
  let en = 0;
  let es = 0;
  for (const t of tokens) {
    if (EN.has(t)) en++;
    if (ES.has(t)) es++;
  }
  es += (text.match(SPANISH_MARKS) ?? []).length;

  // empate o nada reconocible -> inglés
  return { language: es > en ? "es" : "en", scores: { en, es } };
}

/** Tag explícito válido manda; si no (auto, vacío, desconocido) se detecta por el texto */
export function resolveLanguage(tag: unknown, text: string): Language {
  return parseLanguageTag(tag) ?? detectLanguage(text).language;
}
