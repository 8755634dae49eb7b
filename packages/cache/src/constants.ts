export const REDIS_URL = process.env.REDIS_URL || "";
export const CACHE_TTL_SECONDS = parseInt(process.env.CACHE_TTL_SECONDS || "86400", 10); // 24h
export const CACHE_SCOPE = process.env.CACHE_SCOPE || "default"; // multi-tenant opcional

// sin Redis la caché tiene que fallar rápido: la voz sigue sin ella
export const REDIS_CONNECT_TIMEOUT_MS = parseInt(process.env.REDIS_CONNECT_TIMEOUT_MS || "2000", 10);
export const REDIS_MAX_RECONNECTS = parseInt(process.env.REDIS_MAX_RECONNECTS || "3", 10);
export const CACHE_OP_TIMEOUT_MS = parseInt(process.env.CACHE_OP_TIMEOUT_MS || "500", 10);

export const kTTS = (hash: string, scope = CACHE_SCOPE) => `cache:${scope}:tts:${hash}`;
