// apps/api/src/services.ts
import { createMemoryAudioCache, createRedisAudioCache, type AudioCache } from "@avatar-support/cache";
import { createLogger, createOrchestrator, type CoreConfig } from "@avatar-support/core";
import { loadKnowledgeBase, type KnowledgeBase } from "@avatar-support/knowledge";
import { createVoiceClient, type VoiceSynthesisClient } from "@avatar-support/voice";

export type Services = {
  knowledge: KnowledgeBase;
  voice: VoiceSynthesisClient;
  orchestrator: ReturnType<typeof createOrchestrator>;
};

const log = createLogger("api");

function buildAudioCache(cfg: CoreConfig, env: Record<string, string | undefined>): AudioCache | null {
  if (!cfg.VOICE.CACHE.ENABLED) return null;
  if (env.REDIS_URL) return createRedisAudioCache({ url: env.REDIS_URL, ttlSeconds: cfg.VOICE.CACHE.TTL_SECONDS });
  log.warn("VOICE_CACHE_ENABLED sin REDIS_URL: caché en memoria");
  return createMemoryAudioCache({ ttlSeconds: cfg.VOICE.CACHE.TTL_SECONDS });
}

/** Todo lo que se construye una vez al arrancar */
export function buildServices(cfg: CoreConfig, env: Record<string, string | undefined> = process.env): Services {
  const knowledge = loadKnowledgeBase(cfg.KNOWLEDGE_FILE);
  const voice = createVoiceClient(cfg.VOICE, { cache: buildAudioCache(cfg, env) });

  console.log(`[api] knowledge: ${knowledge.entries.length} temas, ${knowledge.rules.length} reglas`);
  console.log(`[api] voice: ${voice.provider}${voice.provider === "mock" ? " (sin clave, modo mock)" : ""}`);

  const orchestrator = createOrchestrator({
    knowledge,
    voice,
    log: createLogger("core", cfg.VERBOSE),
    voiceRetries: cfg.VOICE.RETRIES,
    voiceBudgetMs: cfg.VOICE.TIMEOUT_MS * (cfg.VOICE.RETRIES + 1),
  });
  return { knowledge, voice, orchestrator };
}
