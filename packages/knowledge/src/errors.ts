export class KnowledgeNotFoundError extends Error {
  readonly code = "KNOWLEDGE_NOT_FOUND";

  constructor(readonly keywords: readonly string[]) {
    super(`Sin tema para keywords: ${keywords.join(", ") || "(vacío)"}`);
    this.name = "KnowledgeNotFoundError";
  }
}

/** Fichero de conocimiento inválido: se lanza al arrancar, nunca por petición */
export class KnowledgeConfigError extends Error {
  readonly code = "KNOWLEDGE_CONFIG";

  constructor(message: string) {
    super(message);
    this.name = "KnowledgeConfigError";
  }
}
