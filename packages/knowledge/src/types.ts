// packages/knowledge/src/types.ts
export type Language = "en" | "es";

export const LANGUAGES: readonly Language[] = ["en", "es"];

export type Localized = Readonly<Record<Language, string>>;

/** Intención asociada al tema (la usa el avatar para elegir gesto/tono) */
export type Intent = "greeting" | "gratitude" | "how_to" | "problem_solving" | "information";

export type KnowledgeEntry = Readonly<{
  topic: string;
  category: string;
  intent: Intent;
  title: Localized;
  text: Localized;
  related: readonly string[];
}>;

/**
 * Regla de la tabla ordenada. Cada keyword puede ser:
 *  - token exacto ("wifi")
 *  - prefijo con asterisco ("instal*")
 *  - frase de varias palabras ("bridge mode"), todas presentes
 */
export type KeywordRule = Readonly<{
  topic: string;
  keywords: readonly string[];
}>;

/** Arreglo rápido: pasos cortos para un problema concreto (sin pasar por la búsqueda) */
export type QuickFix = Readonly<{
  key: string;
  title: Localized;
  steps: Readonly<Record<Language, readonly string[]>>;
  estimatedTime: string;
}>;

export type CategorySummary = {
  name: string;
  count: number;
  topics: string[];
};

export type KnowledgeMatch = {
  entry: KnowledgeEntry;
  text: string;
  language: Language;
  /** nº de keywords de la regla que casaron (Infinity si fue por topic key) */
  score: number;
  ruleIndex: number | null;
};

export type KnowledgeBase = {
  readonly entries: readonly KnowledgeEntry[];
  readonly rules: readonly KeywordRule[];
  readonly quickFixes: readonly QuickFix[];
  topics(): string[];
  /** categorías en orden de primera aparición */
  categories(): CategorySummary[];
  byCategory(category: string): KnowledgeEntry[];
  quickFix(key: string): QuickFix | undefined;
  /** vacío si la categoría no tiene preguntas */
  diagnosticQuestions(category: string, language: Language): readonly string[];
  get(topic: string): KnowledgeEntry | undefined;
  related(topic: string): KnowledgeEntry[];
  lookup(keywords: ReadonlySet<string>, language: Language): KnowledgeMatch;
};
