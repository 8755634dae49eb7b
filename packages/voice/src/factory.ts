// packages/voice/src/factory.ts
import type { AudioCache } from "@avatar-support/cache";
import { createElevenLabsClient, ELEVENLABS_DEFAULTS } from "./elevenlabs";
import { createOpenAISpeechClient } from "./openaiSpeech";
import { createMockVoiceClient } from "./mock";
import { withAudioCache } from "./cached";
import { dbg } from "./log";
import type { ProviderName, VoiceSynthesisClient } from "./types";

export type VoiceProviderSetting = ProviderName | "auto";

export type VoiceConfig = {
  PROVIDER: VoiceProviderSetting;
  TIMEOUT_MS: number;
  RETRIES: number;
  ELEVENLABS: { API_KEY: string; MODEL: string; OUTPUT_FORMAT: string; BASE_URL: string };
  OPENAI: { API_KEY: string; MODEL: string };
  CACHE: { ENABLED: boolean; TTL_SECONDS: number; SCOPE: string };
};

/** auto: ElevenLabs si hay clave, si no OpenAI, si no mock */
export function pickProvider(cfg: VoiceConfig): ProviderName {
  if (cfg.PROVIDER !== "auto") return cfg.PROVIDER;
  if (cfg.ELEVENLABS.API_KEY) return "elevenlabs";
  if (cfg.OPENAI.API_KEY) return "openai";
  return "mock";
}

export function createVoiceClient(cfg: VoiceConfig, deps?: { cache?: AudioCache | null }): VoiceSynthesisClient {
  const provider = pickProvider(cfg);

  let client: VoiceSynthesisClient;
  let model = "";
  switch (provider) {
    case "elevenlabs":
      model = cfg.ELEVENLABS.MODEL || ELEVENLABS_DEFAULTS.model;
      client = createElevenLabsClient({
        apiKey: cfg.ELEVENLABS.API_KEY,
        model,
        outputFormat: cfg.ELEVENLABS.OUTPUT_FORMAT,
        baseUrl: cfg.ELEVENLABS.BASE_URL,
        timeoutMs: cfg.TIMEOUT_MS,
      });
      break;
    case "openai":
      model = cfg.OPENAI.MODEL;
      client = createOpenAISpeechClient({ apiKey: cfg.OPENAI.API_KEY, model, timeoutMs: cfg.TIMEOUT_MS });
      break;
    default:
      client = createMockVoiceClient();
      break;
  }

  dbg(`provider=${provider} cache=${cfg.CACHE.ENABLED && deps?.cache ? "ON" : "OFF"}`);
  if (cfg.CACHE.ENABLED && deps?.cache && provider !== "mock") {
    return withAudioCache(client, deps.cache, { ttlSeconds: cfg.CACHE.TTL_SECONDS, scope: cfg.CACHE.SCOPE, model });
  }
  return client;
}
