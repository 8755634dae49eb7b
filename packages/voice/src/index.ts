export * from "./types";
export * from "./errors";
export { createElevenLabsClient, errorFromStatus, ELEVENLABS_DEFAULTS, type ElevenLabsOptions } from "./elevenlabs";
export { createOpenAISpeechClient, errorFromOpenAI, type OpenAISpeechOptions } from "./openaiSpeech";
export { createMockVoiceClient, MOCK_AUDIO } from "./mock";
export { synthesizeWithRetry } from "./retry";
export { withAudioCache } from "./cached";
export { VOICE_PROFILES, getVoiceProfile, profileForTone, isVoiceTone } from "./profiles";
export { optimizeForSpeech, estimateDuration, lipSyncTiming } from "./speech";
export { describeFormat } from "./format";
export { createVoiceClient, pickProvider, type VoiceConfig, type VoiceProviderSetting } from "./factory";
