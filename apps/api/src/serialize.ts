// apps/api/src/serialize.ts
// camelCase interno -> snake_case del contrato HTTP
import type { AvatarInstructions, AvatarPreset, ChatAudio, ChatResponse } from "@avatar-support/core";

export const avatarJson = (a: AvatarInstructions) => ({
  expression: a.expression,
  gesture: a.gesture,
  voice_tone: a.voiceTone,
  animation_duration: a.animationDuration,
});

export const presetJson = (p: AvatarPreset) => ({ ...avatarJson(p), description: p.description });

export const audioJson = (a: ChatAudio) => ({
  audio_base64: a.base64,
  content_type: a.contentType,
  format: a.format,
  voice_id: a.voiceId,
  voice_profile: a.voiceProfile,
  provider: a.provider,
  duration_estimate: a.durationEstimate,
  lip_sync_timing: {
    words: a.timing.words,
    total_duration: a.timing.totalDuration,
    word_count: a.timing.wordCount,
    average_word_duration: a.timing.averageWordDuration,
  },
  mock: a.mock,
  cached: a.cached,
});

export const chatJson = (r: ChatResponse) => ({
  reply: r.replyText,
  language_used: r.languageUsed,
  topic: r.topic,
  matched: r.matched,
  avatar_instructions: avatarJson(r.avatar),
});
