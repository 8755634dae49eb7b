import type { Language } from "@avatar-support/knowledge";
import type { LipSyncTiming, ProviderName, VoiceErrorKind } from "@avatar-support/voice";
import type { AvatarInstructions } from "./avatar";

export type ChatRequest = {
  message: string;
  language?: string | null; // en | es | auto (o cualquier otra cosa = auto)
  includeVoice?: boolean;
};

export type ChatAudio = {
  base64: string;
  contentType: string;
  format: string;
  voiceId: string;
  voiceProfile: string;
  provider: ProviderName;
  durationEstimate: number;
  timing: LipSyncTiming;
  mock: boolean;
  cached: boolean;
};

export type ChatResponse = {
  replyText: string;
  languageUsed: Language;
  topic: string | null;
  matched: boolean;
  avatar: AvatarInstructions;
  audio?: ChatAudio;
  voiceError?: { kind: VoiceErrorKind; message: string };
};
