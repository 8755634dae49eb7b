// packages/voice/src/openaiSpeech.ts
import OpenAI from "openai";
import { VoiceSynthesisError } from "./errors";
import { dbg } from "./log";
import type { SynthesizedAudio, VoiceProfile, VoiceSynthesisClient } from "./types";

export type OpenAISpeechOptions = {
  apiKey: string;
  model?: string;
  timeoutMs?: number;
};

const TTS_MODEL = "tts-1";

/** Errores del SDK -> VoiceSynthesisError (el orden importa: Timeout hereda de Connection) */
export function errorFromOpenAI(e: unknown): VoiceSynthesisError {
  if (e instanceof VoiceSynthesisError) return e;
  if (e instanceof OpenAI.APIConnectionTimeoutError) return new VoiceSynthesisError("timeout", e.message, undefined, { cause: e });
  if (e instanceof OpenAI.APIConnectionError) return new VoiceSynthesisError("network", e.message, undefined, { cause: e });
  if (e instanceof OpenAI.AuthenticationError || e instanceof OpenAI.PermissionDeniedError) {
    return new VoiceSynthesisError("auth", e.message, e.status, { cause: e });
  }
  if (e instanceof OpenAI.RateLimitError) return new VoiceSynthesisError("quota", e.message, e.status, { cause: e });
  if (e instanceof OpenAI.BadRequestError || e instanceof OpenAI.UnprocessableEntityError) {
    return new VoiceSynthesisError("invalid_input", e.message, e.status, { cause: e });
  }
  if (e instanceof OpenAI.APIError) {
    const status = e.status;
    return new VoiceSynthesisError("provider", e.message, status, { cause: e, transient: status === undefined || status >= 500 });
  }
  return new VoiceSynthesisError("provider", e instanceof Error ? e.message : String(e), undefined, { cause: e });
}

export function createOpenAISpeechClient(opts: OpenAISpeechOptions): VoiceSynthesisClient {
  const model = opts.model || TTS_MODEL;
  // reintentos los hace synthesizeWithRetry, no el SDK
  const openai = new OpenAI({ apiKey: opts.apiKey, timeout: opts.timeoutMs ?? 15000, maxRetries: 0 });

  async function synthesize(text: string, voice: VoiceProfile): Promise<SynthesizedAudio> {
    if (!text.trim()) throw new VoiceSynthesisError("invalid_input", "texto vacío");
    const voiceId = voice.ids.openai;
    dbg(`openai voice=${voiceId} (${voice.key}) chars=${text.length}`);

    let audio: Buffer;
    try {
      const res = await openai.audio.speech.create({ model, voice: voiceId, input: text, response_format: "mp3" });
      audio = Buffer.from(await res.arrayBuffer());
    } catch (e) {
      throw errorFromOpenAI(e);
    }

    if (!audio.length) throw new VoiceSynthesisError("provider", "audio vacío");
    return { audio, contentType: "audio/mpeg", format: "mp3", voiceId, provider: "openai", mock: false };
  }

  return { provider: "openai", synthesize };
}
