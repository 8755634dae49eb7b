// packages/core/src/compose.ts
import {
  extractKeywords,
  KnowledgeNotFoundError,
  type Intent,
  type KnowledgeBase,
  type Language,
} from "@avatar-support/knowledge";
import { fallbackReply } from "./messages";

export type Composition = {
  text: string;
  language: Language;
  topic: string | null;
  matched: boolean;
  intent: Intent | null;
  score: number;
};

/**
 * Mensaje -> keywords -> lookup. Sin tema: respuesta genérica localizada.
 * Nunca deja escapar KnowledgeNotFoundError.
 */
export function compose(knowledge: KnowledgeBase, message: string, language: Language): Composition {
  try {
    const hit = knowledge.lookup(extractKeywords(message), language);
    return {
      text: hit.text,
      language,
      topic: hit.entry.topic,
      matched: true,
      intent: hit.entry.intent,
      score: hit.score,
    };
  } catch (e) {
    if (!(e instanceof KnowledgeNotFoundError)) throw e;
    return { text: fallbackReply(language), language, topic: null, matched: false, intent: null, score: 0 };
  }
}
