import { VoiceSynthesisError } from "./errors";
import { dbg, warn } from "./log";
import type { SynthesizedAudio, VoiceProfile, VoiceSynthesisClient } from "./types";

/**
 * Un reintento (por defecto) sólo si el fallo es transitorio: timeout, red o 5xx.
 * Auth, cuota o input inválido se devuelven a la primera.
 * Con `signal` abortado no se lanza ningún intento más.
 */
export async function synthesizeWithRetry(
  client: VoiceSynthesisClient,
  text: string,
  voice: VoiceProfile,
  opts?: { retries?: number; signal?: AbortSignal }
): Promise<SynthesizedAudio> {
  const retries = Math.max(0, opts?.retries ?? 1);
  const signal = opts?.signal;
  if (signal?.aborted) {
    throw new VoiceSynthesisError("timeout", `${client.provider}: síntesis cancelada`, undefined, { transient: false });
  }
  for (let attempt = 0; ; attempt++) {
    try {
      return await client.synthesize(text, voice);
    } catch (e) {
      const err = e instanceof VoiceSynthesisError
        ? e
        : new VoiceSynthesisError("provider", e instanceof Error ? e.message : String(e), undefined, { cause: e });
      if (!err.transient || attempt >= retries || signal?.aborted) throw err;
      warn(`${client.provider} ${err.kind}, reintento ${attempt + 1}/${retries}`);
    } finally {
      dbg(`${client.provider} intento ${attempt + 1}`);
    }
  }
}
