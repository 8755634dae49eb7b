import { describe, expect, it } from "vitest";
import { avatarInstructions, compose, FALLBACK_REPLY } from "@avatar-support/core";
import { loadKnowledgeBase } from "@avatar-support/knowledge";

const kb = loadKnowledgeBase();

describe("compose", () => {
  it("returns each entry's text in the requested language when given its topic key", () => {
    for (const entry of kb.entries) {
      expect(compose(kb, entry.topic, "en").text).toBe(entry.text.en);
      expect(compose(kb, entry.topic, "es").text).toBe(entry.text.es);
    }
  });

  it.each([
    ["How do I install XETA?", "xeta_router_installation"],
    ["Thanks, how do I install XETA?", "xeta_router_installation"],
    ["My printer is not printing", "printer_issue"],
    ["I forgot my password", "password_reset"],
    ["Olvidé mi contraseña", "password_reset"],
    ["My computer is very slow", "slow_performance"],
    ["Hola, buenos días", "greeting"],
    ["gracias", "gratitude"],
  ])("matches %j to %s", (message, topic) => {
    const c = compose(kb, message, "en");
    expect(c.topic).toBe(topic);
    expect(c.matched).toBe(true);
    expect(c.text).toBe(kb.get(topic)?.text.en);
  });

  it("answers in Spanish when asked to", () => {
    const c = compose(kb, "¿Cómo instalo XETA?", "es");
    expect(c.topic).toBe("xeta_router_installation");
    expect(c.text).toContain("modo puente");
    expect(c.language).toBe("es");
  });

  it("falls back to a localized reply instead of throwing", () => {
    expect(compose(kb, "quantum chromodynamics", "en")).toEqual({
      text: "I'm sorry, I didn't understand that. Could you please rephrase your question?",
      language: "en",
      topic: null,
      matched: false,
      intent: null,
      score: 0,
    });
    expect(compose(kb, "???", "es").text).toBe(FALLBACK_REPLY.es);
  });
});

describe("avatarInstructions", () => {
  it("maps intents to expression, gesture and tone", () => {
    expect(avatarInstructions(compose(kb, "Hello!", "en"))).toEqual({
      expression: "helpful",
      gesture: "welcoming",
      voiceTone: "warm",
      animationDuration: 3.5,
    });
    expect(avatarInstructions(compose(kb, "How do I install XETA?", "en"))).toEqual({
      expression: "explaining",
      gesture: "pointing",
      voiceTone: "clear",
      animationDuration: 5,
    });
    expect(avatarInstructions(compose(kb, "My printer is not printing", "en")).voiceTone).toBe("focused");
    expect(avatarInstructions(compose(kb, "gracias", "es")).gesture).toBe("celebration");
    expect(avatarInstructions(compose(kb, "xeta_earning", "en")).voiceTone).toBe("professional");
  });

  it("looks uncertain when nothing matched", () => {
    expect(avatarInstructions({ matched: false, intent: null })).toEqual({
      expression: "thinking",
      gesture: "none",
      voiceTone: "uncertain",
      animationDuration: 3,
    });
  });
});
