import { VoiceSynthesisError } from "./errors";
import type { SynthesizedAudio, VoiceProfile, VoiceSynthesisClient } from "./types";

// Sin clave de proveedor: devolvemos un marcador para que el front siga funcionando
export const MOCK_AUDIO = "mock_audio_data";

export function createMockVoiceClient(): VoiceSynthesisClient {
  return {
    provider: "mock",
    async synthesize(text: string, voice: VoiceProfile): Promise<SynthesizedAudio> {
      if (!text.trim()) throw new VoiceSynthesisError("invalid_input", "texto vacío");
      return {
        audio: Buffer.from(MOCK_AUDIO, "utf-8"),
        contentType: "audio/mpeg",
        format: "mp3",
        voiceId: voice.ids.elevenlabs,
        provider: "mock",
        mock: true,
      };
    },
  };
}
