// packages/knowledge/src/keywords.ts

export function normalize(q: string) {
  return q
    .toLowerCase()
    .normalize("NFD").replace(/[\u0300-\u036f]/g, "") // quita acentos
    .replace(/[^\p{L}\p{N}_\s]/gu, " ") // quita puntuación (el "_" se queda: topic keys)
    .replace(/\s+/g, " ")
    .trim();
}

export function extractKeywords(message: string): Set<string> {
  const norm = normalize(message);
  return new Set(norm ? norm.split(" ") : []);
}

/** ¿La keyword de la regla casa con el conjunto de tokens del usuario? */
export function keywordMatches(keyword: string, tokens: ReadonlySet<string>): boolean {
  const k = normalize(keyword.replace(/\*$/, "")) + (keyword.endsWith("*") ? "*" : "");
  if (!k || k === "*") return false;

  if (k.includes(" ")) {
    return k.split(" ").every((w) => tokens.has(w));
  }
  if (k.endsWith("*")) {
    const prefix = k.slice(0, -1);
    for (const t of tokens) if (t.startsWith(prefix)) return true;
    return false;
  }
  return tokens.has(k);
}
