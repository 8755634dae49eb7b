// packages/voice/src/speech.ts
import type { Language } from "@avatar-support/knowledge";
import type { LipSyncTiming } from "./types";

const WORDS_PER_MINUTE = 150;

const SPELLED: ReadonlyArray<[RegExp, string]> = [
  [/\bWiFi\b/g, "Wi-Fi"],
  [/\bAPI\b/g, "A-P-I"],
  [/\bURL\b/g, "U-R-L"],
  [/\bHTML\b/g, "H-T-M-L"],
  [/\bCSS\b/g, "C-S-S"],
  [/\bUSB\b/g, "U-S-B"],
  [/\bJavaScript\b/g, "Java Script"],
];

const SPANISH_TERMS: ReadonlyArray<[RegExp, string]> = [
  [/\bemail\b/g, "correo electrónico"],
  [/\brouter\b/g, "enrutador"],
];

/** Limpia el texto antes de mandarlo al TTS: puntuación repetida y siglas deletreadas */
export function optimizeForSpeech(text: string, language: Language = "en"): string {
  let out = text
    .replace(/\.{3,}/g, ".")
    .replace(/!{2,}/g, "!")
    .replace(/\?{2,}/g, "?");

  for (const [re, to] of SPELLED) out = out.replace(re, to);
  if (language === "es") for (const [re, to] of SPANISH_TERMS) out = out.replace(re, to);

  return out.replace(/\s+/g, " ").trim();
}

const round2 = (n: number) => Math.round(n * 100) / 100;

const words = (text: string) => text.split(/\s+/).filter(Boolean);

/** Segundos estimados a 150 palabras/minuto */
export function estimateDuration(text: string): number {
  return round2((words(text).length / WORDS_PER_MINUTE) * 60);
}

/**
 * Reparto de tiempos por palabra para el lip-sync del avatar.
 * Las palabras largas duran algo más que la media: base * (0.8 + len/10).
 */
export function lipSyncTiming(text: string, duration = estimateDuration(text)): LipSyncTiming {
  const list = words(text);
  if (!list.length) return { words: [], totalDuration: 0, wordCount: 0, averageWordDuration: 0 };

  const base = duration / list.length;
  let t = 0;
  const timings = list.map((word) => {
    const d = base * (0.8 + word.length / 10);
    const w = { word, start: round2(t), end: round2(t + d), duration: round2(d) };
    t += d;
    return w;
  });

  return {
    words: timings,
    totalDuration: duration,
    wordCount: list.length,
    averageWordDuration: round2(base),
  };
}
