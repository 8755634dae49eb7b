import { audioKey, type AudioCache } from "@avatar-support/cache";
import { warn, dbg } from "./log";
import type { VoiceSynthesisClient } from "./types";

const errMsg = (e: unknown) => (e instanceof Error ? e.message : String(e));

/**
 * Envuelve un cliente con la caché de audio.
 * Si la caché falla seguimos sin ella; el audio mock nunca se guarda.
 */
export function withAudioCache(
  client: VoiceSynthesisClient,
  cache: AudioCache,
  opts?: { ttlSeconds?: number; scope?: string; model?: string }
): VoiceSynthesisClient {
  return {
    provider: client.provider,
    async synthesize(text, voice) {
      const key = audioKey(`${client.provider}:${voice.key}`, text, { scope: opts?.scope, model: opts?.model });

      const hit = await cache.get(key).catch((e: unknown) => {
        warn("cache get error:", errMsg(e));
        return null;
      });
      if (hit) {
        dbg(`HIT cache ${voice.key}`);
        return {
          audio: Buffer.from(hit.base64, "base64"),
          contentType: hit.contentType,
          format: hit.format,
          voiceId: hit.voiceId,
          provider: client.provider,
          mock: false,
          cached: true,
        };
      }

      const out = await client.synthesize(text, voice);
      if (!out.mock) {
        await cache
          .set(
            key,
            {
              base64: out.audio.toString("base64"),
              contentType: out.contentType,
              format: out.format,
              provider: out.provider,
              voiceId: out.voiceId,
              createdAt: Date.now(),
            },
            opts?.ttlSeconds
          )
          .catch((e: unknown) => warn("cache set error:", errMsg(e)));
      }
      return out;
    },
  };
}
