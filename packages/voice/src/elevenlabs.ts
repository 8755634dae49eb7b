// packages/voice/src/elevenlabs.ts
import { VoiceSynthesisError } from "./errors";
import { describeFormat } from "./format";
import { dbg } from "./log";
import type { SynthesizedAudio, VoiceProfile, VoiceSynthesisClient } from "./types";

export type ElevenLabsOptions = {
  apiKey: string;
  model?: string;
  outputFormat?: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

export const ELEVENLABS_DEFAULTS = {
  model: "eleven_multilingual_v2",
  outputFormat: "mp3_44100_128",
  baseUrl: "https://api.elevenlabs.io",
  timeoutMs: 15000,
} as const;

const errMsg = (e: unknown) => (e instanceof Error ? e.message : String(e));

/** Traduce un status HTTP de ElevenLabs a nuestro error tipado */
export function errorFromStatus(status: number, body: string): VoiceSynthesisError {
  const detail = body.slice(0, 200);
  if (status === 401 || status === 403) {
    return /quota_exceeded/i.test(body)
      ? new VoiceSynthesisError("quota", `cuota agotada (${status}): ${detail}`, status)
      : new VoiceSynthesisError("auth", `credenciales rechazadas (${status})`, status);
  }
  if (status === 429) return new VoiceSynthesisError("quota", `límite de uso (429): ${detail}`, status);
  if (status === 400 || status === 422) return new VoiceSynthesisError("invalid_input", `petición rechazada (${status}): ${detail}`, status);
  if (status >= 500) return new VoiceSynthesisError("provider", `error del proveedor (${status})`, status);
  return new VoiceSynthesisError("provider", `respuesta inesperada (${status}): ${detail}`, status, { transient: false });
}

function fromThrown(e: unknown, timeoutMs: number): VoiceSynthesisError {
  if (e instanceof VoiceSynthesisError) return e;
  const name = e instanceof Error ? e.name : "";
  if (name === "TimeoutError" || name === "AbortError") {
    return new VoiceSynthesisError("timeout", `sin respuesta en ${timeoutMs}ms`, undefined, { cause: e });
  }
  return new VoiceSynthesisError("network", `fallo de red: ${errMsg(e)}`, undefined, { cause: e });
}

export function createElevenLabsClient(opts: ElevenLabsOptions): VoiceSynthesisClient {
  const model = opts.model || ELEVENLABS_DEFAULTS.model;
  const outputFormat = opts.outputFormat || ELEVENLABS_DEFAULTS.outputFormat;
  const baseUrl = (opts.baseUrl || ELEVENLABS_DEFAULTS.baseUrl).replace(/\/+$/, "");
  const timeoutMs = opts.timeoutMs ?? ELEVENLABS_DEFAULTS.timeoutMs;
  const doFetch = opts.fetchImpl ?? fetch;
  const { format, contentType } = describeFormat(outputFormat);

  async function synthesize(text: string, voice: VoiceProfile): Promise<SynthesizedAudio> {
    if (!text.trim()) throw new VoiceSynthesisError("invalid_input", "texto vacío");
    if (!opts.apiKey) throw new VoiceSynthesisError("auth", "ELEVENLABS_API_KEY no está definido");

    const voiceId = voice.ids.elevenlabs;
    const url = `${baseUrl}/v1/text-to-speech/${encodeURIComponent(voiceId)}?output_format=${encodeURIComponent(outputFormat)}`;
    dbg(`elevenlabs voice=${voice.key} chars=${text.length}`);

    let audio: Buffer;
    try {
      const res = await doFetch(url, {
        method: "POST",
        headers: {
          "xi-api-key": opts.apiKey,
          "Content-Type": "application/json",
          Accept: contentType,
        },
        body: JSON.stringify({
          text,
          model_id: model,
          voice_settings: {
            stability: voice.settings.stability,
            similarity_boost: voice.settings.similarityBoost,
            style: voice.settings.style,
            use_speaker_boost: voice.settings.useSpeakerBoost,
          },
        }),
        signal: AbortSignal.timeout(timeoutMs),
      });

      if (!res.ok) {
        const body = await res.text().catch(() => "");
        throw errorFromStatus(res.status, body);
      }
      audio = Buffer.from(await res.arrayBuffer());
    } catch (e) {
      throw fromThrown(e, timeoutMs);
    }

    if (!audio.length) throw new VoiceSynthesisError("provider", "audio vacío");
    return { audio, contentType, format, voiceId, provider: "elevenlabs", mock: false };
  }

  return { provider: "elevenlabs", synthesize };
}
