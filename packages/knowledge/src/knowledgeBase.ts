// packages/knowledge/src/knowledgeBase.ts
import { knowledgeFileSchema } from "./schema";
import { KnowledgeConfigError, KnowledgeNotFoundError } from "./errors";
import { keywordMatches } from "./keywords";
import type {
  CategorySummary,
  KeywordRule,
  KnowledgeBase,
  KnowledgeEntry,
  KnowledgeMatch,
  Language,
  Localized,
  QuickFix,
} from "./types";

type LocalizedList = Readonly<Record<Language, readonly string[]>>;

const freezeList = (l: { en: string[]; es: string[] }): LocalizedList =>
  Object.freeze({ en: Object.freeze([...l.en]), es: Object.freeze([...l.es]) });

/**
 * Construye la base de conocimiento a partir del documento (ya parseado de YAML).
 * Valida, congela y devuelve un objeto inmutable que se pasa al orquestador.
 */
export function createKnowledgeBase(doc: unknown): KnowledgeBase {
  const parsed = knowledgeFileSchema.safeParse(doc);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new KnowledgeConfigError(`knowledge inválido en ${first.path.join(".") || "(raíz)"}: ${first.message}`);
  }

  const byTopic = new Map<string, KnowledgeEntry>();
  for (const e of parsed.data.entries) {
    if (byTopic.has(e.topic)) throw new KnowledgeConfigError(`topic duplicado: ${e.topic}`);
    byTopic.set(
      e.topic,
      Object.freeze({
        ...e,
        title: Object.freeze({ ...e.title }),
        text: Object.freeze({ ...e.text }),
        related: Object.freeze([...e.related]),
      })
    );
  }

  for (const e of byTopic.values()) {
    for (const r of e.related) {
      if (!byTopic.has(r)) throw new KnowledgeConfigError(`${e.topic}: related desconocido "${r}"`);
    }
  }

  const rules: KeywordRule[] = parsed.data.rules.map((r, i) => {
    if (!byTopic.has(r.topic)) throw new KnowledgeConfigError(`rules[${i}]: topic desconocido "${r.topic}"`);
    return Object.freeze({ topic: r.topic, keywords: Object.freeze([...r.keywords]) });
  });

  const fixes = new Map<string, QuickFix>();
  for (const f of parsed.data.quick_fixes) {
    if (fixes.has(f.key)) throw new KnowledgeConfigError(`quick fix duplicado: ${f.key}`);
    const title: Localized = Object.freeze({ ...f.title });
    fixes.set(f.key, Object.freeze({ key: f.key, title, steps: freezeList(f.steps), estimatedTime: f.estimated_time }));
  }

  const entries = Object.freeze([...byTopic.values()]);
  const frozenRules = Object.freeze(rules);
  const categoryNames = new Set(entries.map((e) => e.category));

  const diagnostics = new Map<string, LocalizedList>();
  for (const [category, questions] of Object.entries(parsed.data.diagnostics)) {
    if (!categoryNames.has(category)) throw new KnowledgeConfigError(`diagnostics: categoría desconocida "${category}"`);
    diagnostics.set(category, freezeList(questions));
  }

  function categories(): CategorySummary[] {
    const out = new Map<string, CategorySummary>();
    for (const e of entries) {
      const c = out.get(e.category) ?? { name: e.category, count: 0, topics: [] };
      c.count++;
      c.topics.push(e.topic);
      out.set(e.category, c);
    }
    return [...out.values()];
  }

  const match = (entry: KnowledgeEntry, language: Language, score: number, ruleIndex: number | null): KnowledgeMatch => ({
    entry,
    text: entry.text[language],
    language,
    score,
    ruleIndex,
  });

  function lookup(keywords: ReadonlySet<string>, language: Language): KnowledgeMatch {
    // 1) topic key literal gana siempre
    for (const k of keywords) {
      const hit = byTopic.get(k);
      if (hit) return match(hit, language, Infinity, null);
    }

    // 2) tabla ordenada: mayor nº de keywords; empate → la regla más antigua
    let best = -1;
    let bestScore = 0;
    frozenRules.forEach((rule, i) => {
      const score = rule.keywords.filter((k) => keywordMatches(k, keywords)).length;
      if (score > bestScore) {
        best = i;
        bestScore = score;
      }
    });

    const rule = frozenRules[best];
    const entry = rule ? byTopic.get(rule.topic) : undefined;
    if (!entry) throw new KnowledgeNotFoundError([...keywords]);
    return match(entry, language, bestScore, best);
  }

  return Object.freeze({
    entries,
    rules: frozenRules,
    quickFixes: Object.freeze([...fixes.values()]),
    topics: () => [...byTopic.keys()],
    categories,
    byCategory: (category: string) => entries.filter((e) => e.category === category),
    quickFix: (k: string) => fixes.get(k.trim().toLowerCase()),
    diagnosticQuestions: (category: string, language: Language) => diagnostics.get(category)?.[language] ?? [],
    get: (topic: string) => byTopic.get(topic),
    related: (topic: string) =>
      (byTopic.get(topic)?.related ?? []).flatMap((t) => {
        const e = byTopic.get(t);
        return e ? [e] : [];
      }),
    lookup,
  });
}
