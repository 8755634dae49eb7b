export * from "./types";
export * from "./errors";
export { normalize, extractKeywords, keywordMatches } from "./keywords";
export { createKnowledgeBase } from "./knowledgeBase";
export { loadKnowledgeBase, DEFAULT_KNOWLEDGE_FILE } from "./load";
export type { KnowledgeFile } from "./schema";
