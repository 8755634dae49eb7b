import { vi } from "vitest";
import type { Logger } from "@avatar-support/core";
import {
  VoiceSynthesisError,
  type ProviderName,
  type SynthesizedAudio,
  type VoiceErrorKind,
  type VoiceProfile,
  type VoiceSynthesisClient,
} from "@avatar-support/voice";

export const silentLogger = (): Logger => ({ dbg: vi.fn(), warn: vi.fn(), error: vi.fn() });

export function fakeAudio(voice: VoiceProfile, provider: ProviderName = "elevenlabs"): SynthesizedAudio {
  return {
    audio: Buffer.from("fake-mp3"),
    contentType: "audio/mpeg",
    format: "mp3",
    voiceId: voice.ids.elevenlabs,
    provider,
    mock: false,
  };
}

/** Cliente que responde siempre bien; `calls` guarda (texto, perfil) */
export function okClient() {
  const calls: Array<{ text: string; voice: string }> = [];
  const client: VoiceSynthesisClient = {
    provider: "elevenlabs",
    synthesize: vi.fn(async (text: string, voice: VoiceProfile) => {
      calls.push({ text, voice: voice.key });
      return fakeAudio(voice);
    }),
  };
  return { client, calls };
}

export function failingClient(kind: VoiceErrorKind) {
  const synthesize = vi.fn(async (_text: string, _voice: VoiceProfile): Promise<SynthesizedAudio> => {
    throw new VoiceSynthesisError(kind, `fallo simulado: ${kind}`);
  });
  const client: VoiceSynthesisClient = { provider: "elevenlabs", synthesize };
  return { client, synthesize };
}
