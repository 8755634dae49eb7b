// packages/core/src/orchestrator.ts
import type { KnowledgeBase, Language } from "@avatar-support/knowledge";
import {
  estimateDuration,
  getVoiceProfile,
  lipSyncTiming,
  optimizeForSpeech,
  profileForTone,
  synthesizeWithRetry,
  VoiceSynthesisError,
  type SynthesizedAudio,
  type VoiceProfile,
  type VoiceSynthesisClient,
} from "@avatar-support/voice";
import { avatarInstructions } from "./avatar";
import { compose } from "./compose";
import { InputInvalidError } from "./errors";
import { resolveLanguage } from "./language";
import { createLogger, type Logger } from "./log";
import { TimeoutError, withTimeout } from "./time";
import type { ChatAudio, ChatRequest, ChatResponse } from "./types";

export type OrchestratorDeps = {
  knowledge: KnowledgeBase;
  voice?: VoiceSynthesisClient | null;
  /** tope total para la síntesis (incluido el reintento) */
  voiceBudgetMs?: number;
  voiceRetries?: number;
  log?: Logger;
};

export type SpeakOptions = {
  language: Language;
  tone?: string;
  voiceKey?: string;
};

function toVoiceError(e: unknown): VoiceSynthesisError {
  if (e instanceof VoiceSynthesisError) return e;
  if (e instanceof TimeoutError) return new VoiceSynthesisError("timeout", e.message, undefined, { cause: e });
  return new VoiceSynthesisError("provider", e instanceof Error ? e.message : String(e), undefined, { cause: e });
}

export function createOrchestrator(deps: OrchestratorDeps) {
  const log = deps.log ?? createLogger("core");
  const budgetMs = deps.voiceBudgetMs ?? 30000;
  const retries = deps.voiceRetries ?? 1;

  function pickVoice(opts: SpeakOptions): VoiceProfile {
    if (opts.voiceKey) {
      const p = getVoiceProfile(opts.voiceKey);
      if (!p) throw new InputInvalidError(`voz desconocida: ${opts.voiceKey}`);
      return p;
    }
    return profileForTone(opts.tone ?? "professional", opts.language);
  }

  /** Texto -> audio con perfil, reintento y tope de tiempo. Lanza VoiceSynthesisError. */
  async function speak(text: string, opts: SpeakOptions): Promise<ChatAudio> {
    const voice = pickVoice(opts);
    const client = deps.voice;
    if (!client) throw new VoiceSynthesisError("provider", "no hay proveedor de voz configurado", undefined, { transient: false });

    const spoken = optimizeForSpeech(text, voice.language);
    if (!spoken) throw new VoiceSynthesisError("invalid_input", "texto vacío");

    // al agotar el tope se aborta: nada de reintentos para una respuesta ya enviada
    const ac = new AbortController();
    let out: SynthesizedAudio;
    try {
      out = await withTimeout(
        synthesizeWithRetry(client, spoken, voice, { retries, signal: ac.signal }),
        budgetMs,
        `voice:${client.provider}`
      );
    } catch (e) {
      ac.abort();
      throw toVoiceError(e);
    }

    const durationEstimate = estimateDuration(spoken);
    return {
      base64: out.audio.toString("base64"),
      contentType: out.contentType,
      format: out.format,
      voiceId: out.voiceId,
      voiceProfile: voice.key,
      provider: out.provider,
      durationEstimate,
      timing: lipSyncTiming(spoken, durationEstimate),
      mock: out.mock,
      cached: out.cached ?? false,
    };
  }

  async function handle(req: ChatRequest): Promise<ChatResponse> {
    const message = typeof req.message === "string" ? req.message.trim() : "";
    if (!message) throw new InputInvalidError("message es obligatorio");

    const languageUsed = resolveLanguage(req.language, message);
    const composed = compose(deps.knowledge, message, languageUsed);
    const avatar = avatarInstructions(composed);
    log.dbg(`lang=${languageUsed} topic=${composed.topic ?? "-"} score=${composed.score}`);

    const res: ChatResponse = {
      replyText: composed.text,
      languageUsed,
      topic: composed.topic,
      matched: composed.matched,
      avatar,
    };
    if (!req.includeVoice) return res;

    // la voz nunca tumba la respuesta: sin audio y seguimos
    try {
      res.audio = await speak(composed.text, { language: languageUsed, tone: avatar.voiceTone });
    } catch (e) {
      const err = toVoiceError(e);
      log.warn(`voice ${err.kind}: ${err.message}`);
      res.voiceError = { kind: err.kind, message: err.message };
    }
    return res;
  }

  return { handle, speak };
}

export type Orchestrator = ReturnType<typeof createOrchestrator>;
