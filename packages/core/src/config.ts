// packages/core/src/config.ts
import type { VoiceConfig, VoiceProviderSetting } from "@avatar-support/voice";

type Env = Record<string, string | undefined>;

export const toBool = (v: string | undefined, d = false) => {
  const s = String(v ?? "").trim().toLowerCase();
  if (!s) return d;
  if (["1", "true", "yes", "y", "on"].includes(s)) return true;
  if (["0", "false", "no", "n", "off"].includes(s)) return false;
  return d;
};
export const toInt = (v: string | undefined, d: number) => {
  const n = parseInt(String(v ?? ""), 10);
  return Number.isFinite(n) ? n : d;
};
export const toList = (v: string | undefined, d: string[] = []) => {
  const list = String(v ?? "").split(",").map((s) => s.trim()).filter(Boolean);
  return list.length ? list : d;
};

const PROVIDERS: readonly VoiceProviderSetting[] = ["auto", "elevenlabs", "openai", "mock"];

const toProvider = (v: string | undefined): VoiceProviderSetting => {
  const s = String(v ?? "").trim().toLowerCase();
  return PROVIDERS.find((p) => p === s) ?? "auto";
};

export type CoreConfig = {
  VERBOSE: boolean;
  KNOWLEDGE_FILE: string | undefined;
  VOICE: VoiceConfig;
};

export function loadCoreConfig(env: Env = process.env): CoreConfig {
  return {
    VERBOSE: toBool(env.CORE_VERBOSE, false),
    KNOWLEDGE_FILE: env.KNOWLEDGE_FILE || undefined,

    // Voz
    VOICE: {
      PROVIDER: toProvider(env.VOICE_PROVIDER),
      TIMEOUT_MS: toInt(env.VOICE_TIMEOUT_MS, 15000),
      RETRIES: toInt(env.VOICE_RETRIES, 1),
      ELEVENLABS: {
        API_KEY: env.ELEVENLABS_API_KEY || "",
        MODEL: env.ELEVENLABS_MODEL || "eleven_multilingual_v2",
        OUTPUT_FORMAT: env.ELEVENLABS_OUTPUT_FORMAT || "mp3_44100_128",
        BASE_URL: env.ELEVENLABS_BASE_URL || "https://api.elevenlabs.io",
      },
      OPENAI: {
        API_KEY: env.OPENAI_API_KEY || "",
        MODEL: env.OPENAI_TTS_MODEL || "tts-1",
      },
      CACHE: {
        ENABLED: toBool(env.VOICE_CACHE_ENABLED, false),
        TTL_SECONDS: toInt(env.CACHE_TTL_SECONDS, 86400),
        SCOPE: env.CACHE_SCOPE || "default",
      },
    },
  };
}
