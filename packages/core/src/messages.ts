// packages/core/src/messages.ts
import type { Language } from "@avatar-support/knowledge";

export const FALLBACK_REPLY: Readonly<Record<Language, string>> = {
  en: "I'm sorry, I didn't understand that. Could you please rephrase your question?",
  es: "Lo siento, no entendí eso. ¿Podrías reformular tu pregunta por favor?",
};

export function fallbackReply(language: Language) {
  return FALLBACK_REPLY[language];
}
