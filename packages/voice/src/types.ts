// packages/voice/src/types.ts
import type { Language } from "@avatar-support/knowledge";

export type ProviderName = "elevenlabs" | "openai" | "mock";

/** Tonos que pide el avatar; cada uno acaba en uno de los cuatro estilos de voz */
export type VoiceTone =
  | "professional"
  | "warm"
  | "empathetic"
  | "uncertain"
  | "focused"
  | "confident"
  | "clear"
  | "confirming"
  | "excited";

export type VoiceStyle = "professional_female" | "warm_friendly" | "confident_expert" | "encouraging_supportive";

export type OpenAIVoice = "alloy" | "echo" | "fable" | "onyx" | "nova" | "shimmer";

export type VoiceSettings = Readonly<{
  stability: number;
  similarityBoost: number;
  style: number;
  useSpeakerBoost: boolean;
}>;

export type VoiceProfile = Readonly<{
  key: string; // p.ej. "warm_friendly_es"
  name: string;
  description: string;
  language: Language;
  style: VoiceStyle;
  ids: Readonly<{ elevenlabs: string; openai: OpenAIVoice }>;
  settings: VoiceSettings;
}>;

export type SynthesizedAudio = {
  audio: Buffer;
  contentType: string;
  format: string;
  voiceId: string;
  provider: ProviderName;
  mock: boolean;
  cached?: boolean;
};

export interface VoiceSynthesisClient {
  readonly provider: ProviderName;
  synthesize(text: string, voice: VoiceProfile): Promise<SynthesizedAudio>;
}

export type WordTiming = { word: string; start: number; end: number; duration: number };

export type LipSyncTiming = {
  words: WordTiming[];
  totalDuration: number;
  wordCount: number;
  averageWordDuration: number;
};
