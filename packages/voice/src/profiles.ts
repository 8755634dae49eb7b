// packages/voice/src/profiles.ts
import type { Language } from "@avatar-support/knowledge";
import type { OpenAIVoice, VoiceProfile, VoiceSettings, VoiceStyle, VoiceTone } from "./types";

const SETTINGS: Record<VoiceStyle, VoiceSettings> = {
  professional_female: { stability: 0.75, similarityBoost: 0.85, style: 0.2, useSpeakerBoost: true },
  warm_friendly: { stability: 0.7, similarityBoost: 0.8, style: 0.35, useSpeakerBoost: true },
  confident_expert: { stability: 0.8, similarityBoost: 0.9, style: 0.15, useSpeakerBoost: true },
  encouraging_supportive: { stability: 0.65, similarityBoost: 0.75, style: 0.4, useSpeakerBoost: true },
};

// voces estándar de OpenAI, una por estilo
const OPENAI_VOICE: Record<VoiceStyle, OpenAIVoice> = {
  professional_female: "nova",
  warm_friendly: "shimmer",
  confident_expert: "onyx",
  encouraging_supportive: "fable",
};

const profile = (
  style: VoiceStyle,
  language: Language,
  elevenlabs: string,
  name: string,
  description: string
): VoiceProfile =>
  Object.freeze({
    key: `${style}_${language}`,
    name,
    description,
    language,
    style,
    ids: Object.freeze({ elevenlabs, openai: OPENAI_VOICE[style] }),
    settings: Object.freeze({ ...SETTINGS[style] }),
  });

export const VOICE_PROFILES: readonly VoiceProfile[] = Object.freeze([
  profile("professional_female", "en", "EXAVITQu4vr4xnSDxMaL", "Professional Mia (English)",
    "Clear and friendly voice for general support"),
  profile("warm_friendly", "en", "ThT5KcBeYPX3keUQqHPh", "Warm Mia (English)",
    "Empathetic voice for greetings and uncertain moments"),
  profile("confident_expert", "en", "pNInz6obpgDQGcFmaJgB", "Expert Mia (English)",
    "Confident voice for troubleshooting steps"),
  profile("encouraging_supportive", "en", "XrExE9yKIg1WjnnlVkGX", "Supportive Mia (English)",
    "Upbeat voice for celebrations and encouragement"),
  profile("professional_female", "es", "MF3mGyEYCl7XYWbV9V6O", "Mia Profesional (Español)",
    "Voz clara y amable para soporte general"),
  profile("warm_friendly", "es", "XB0fDUnXU5powFXDhCwa", "Mia Cálida (Español)",
    "Voz empática para saludos y dudas"),
  profile("confident_expert", "es", "VR6AewLTigWG4xSOukaG", "Mia Experta (Español)",
    "Voz segura para pasos de diagnóstico"),
  profile("encouraging_supportive", "es", "ErXwobaYiN019PkySvjV", "Mia Alentadora (Español)",
    "Voz animada para celebrar y animar"),
]);

const TONE_STYLE: Record<VoiceTone, VoiceStyle> = {
  professional: "professional_female",
  clear: "professional_female",
  confirming: "professional_female",
  warm: "warm_friendly",
  empathetic: "warm_friendly",
  uncertain: "warm_friendly",
  focused: "confident_expert",
  confident: "confident_expert",
  excited: "encouraging_supportive",
};

const byKey = new Map(VOICE_PROFILES.map((p) => [p.key, p]));

export function isVoiceTone(v: string): v is VoiceTone {
  return Object.prototype.hasOwnProperty.call(TONE_STYLE, v);
}

export function getVoiceProfile(key: string): VoiceProfile | undefined {
  return byKey.get(key);
}

/** Tono → perfil del idioma; tono desconocido → profesional */
export function profileForTone(tone: string, language: Language): VoiceProfile {
  const style = isVoiceTone(tone) ? TONE_STYLE[tone] : "professional_female";
  return byKey.get(`${style}_${language}`) ?? VOICE_PROFILES[0];
}
