import { createHash } from "node:crypto";
import { getRedis } from "./redisClient";
import { kTTS, CACHE_TTL_SECONDS, CACHE_SCOPE, CACHE_OP_TIMEOUT_MS } from "./constants";
import type { AudioCache, CachedAudio } from "./types";

export type { AudioCache, CachedAudio } from "./types";
export { getRedis, closeRedis } from "./redisClient";
export { REDIS_URL, CACHE_TTL_SECONDS, CACHE_SCOPE, CACHE_OP_TIMEOUT_MS, kTTS } from "./constants";

function normalize(s: string) {
  return s.trim().replace(/\s+/g, " ");
}

function sha1(s: string) {
  return createHash("sha1").update(s).digest("hex");
}

/** Clave estable por voz + modelo + texto (el texto se normaliza sólo en espacios: la puntuación cambia la locución) */
export function audioKey(voiceId: string, text: string, opts?: { model?: string; scope?: string }) {
  const hash = sha1(`${voiceId}|${opts?.model ?? ""}|${normalize(text)}`);
  return kTTS(hash, opts?.scope ?? CACHE_SCOPE);
}

function isCachedAudio(v: unknown): v is CachedAudio {
  return (
    !!v && typeof v === "object" &&
    "base64" in v && typeof v.base64 === "string" &&
    "contentType" in v && typeof v.contentType === "string" &&
    "format" in v && typeof v.format === "string" &&
    "provider" in v && typeof v.provider === "string" &&
    "voiceId" in v && typeof v.voiceId === "string" &&
    "createdAt" in v && typeof v.createdAt === "number"
  );
}

/** Corta la operación si Redis no contesta a tiempo (conexión incluida) */
function bounded<T>(p: Promise<T>, ms: number, label: string): Promise<T> {
  let t: NodeJS.Timeout | undefined;
  const killer = new Promise<never>((_, rej) => {
    t = setTimeout(() => rej(new Error(`cache ${label}: sin respuesta en ${ms}ms`)), ms);
  });
  return Promise.race([p, killer]).finally(() => clearTimeout(t));
}

export function createRedisAudioCache(opts?: { url?: string; ttlSeconds?: number; timeoutMs?: number }): AudioCache {
  const defaultTtl = opts?.ttlSeconds ?? CACHE_TTL_SECONDS;
  const timeoutMs = opts?.timeoutMs ?? CACHE_OP_TIMEOUT_MS;
  return {
    get(key) {
      const op = async () => {
        const redis = await getRedis(opts?.url);
        const raw = await redis.get(key);
        if (!raw) return null;
        const parsed: unknown = JSON.parse(raw);
        return isCachedAudio(parsed) ? parsed : null;
      };
      return bounded(op(), timeoutMs, "get");
    },
    set(key, value, ttlSeconds) {
      const op = async () => {
        const redis = await getRedis(opts?.url);
        await redis.set(key, JSON.stringify(value), { EX: ttlSeconds ?? defaultTtl });
      };
      return bounded(op(), timeoutMs, "set");
    },
  };
}

/** Caché en proceso (tests y arranque sin REDIS_URL) */
export function createMemoryAudioCache(opts?: { ttlSeconds?: number; now?: () => number }): AudioCache {
  const now = opts?.now ?? Date.now;
  const defaultTtl = opts?.ttlSeconds ?? CACHE_TTL_SECONDS;
  const store = new Map<string, { value: CachedAudio; expiresAt: number }>();
  return {
    async get(key) {
      const hit = store.get(key);
      if (!hit) return null;
      if (hit.expiresAt <= now()) {
        store.delete(key);
        return null;
      }
      return hit.value;
    },
    async set(key, value, ttlSeconds) {
      store.set(key, { value, expiresAt: now() + (ttlSeconds ?? defaultTtl) * 1000 });
    },
  };
}
