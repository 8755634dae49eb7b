import { describe, expect, it } from "vitest";
import { detectLanguage, parseLanguageTag, resolveLanguage } from "@avatar-support/core";

describe("resolveLanguage", () => {
  it("always honours a valid explicit tag", () => {
    expect(resolveLanguage("es", "How do I install XETA?")).toBe("es");
    expect(resolveLanguage("EN", "¿Cómo instalo XETA?")).toBe("en");
    expect(resolveLanguage(" es-MX ", "Hello")).toBe("es");
  });

  it("detects Spanish when the tag is auto", () => {
    expect(resolveLanguage("auto", "¿Cómo instalo XETA?")).toBe("es");
  });

  it("treats missing or unknown tags as auto", () => {
    expect(resolveLanguage(undefined, "How do I install XETA?")).toBe("en");
    expect(resolveLanguage("fr", "hola, necesito ayuda")).toBe("es");
    expect(resolveLanguage(null, "")).toBe("en");
  });
});

describe("detectLanguage", () => {
  it("scores indicative words and Spanish orthography", () => {
    expect(detectLanguage("¿Cómo instalo XETA?")).toEqual({ language: "es", scores: { en: 0, es: 4 } });
    expect(detectLanguage("How do I install XETA?")).toEqual({ language: "en", scores: { en: 4, es: 0 } });
    expect(detectLanguage("mañana")).toEqual({ language: "es", scores: { en: 0, es: 1 } });
  });

  it("falls back to English on ties and on nothing recognisable", () => {
    expect(detectLanguage("hola hello").language).toBe("en");
    expect(detectLanguage("12345").language).toBe("en");
    expect(detectLanguage("XETA").scores).toEqual({ en: 0, es: 0 });
  });
});

describe("parseLanguageTag", () => {
  it("accepts only en and es, with optional region", () => {
    expect(parseLanguageTag("es_AR")).toBe("es");
    expect(parseLanguageTag("en-GB")).toBe("en");
    expect(parseLanguageTag("auto")).toBeNull();
    expect(parseLanguageTag("")).toBeNull();
    expect(parseLanguageTag(42)).toBeNull();
  });
});
