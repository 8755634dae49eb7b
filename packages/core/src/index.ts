export * from "./types";
export { createOrchestrator, type Orchestrator, type OrchestratorDeps, type SpeakOptions } from "./orchestrator";
export { compose, type Composition } from "./compose";
export { resolveLanguage, detectLanguage, parseLanguageTag, type LanguageTag } from "./language";
export { fallbackReply, FALLBACK_REPLY } from "./messages";
export {
  avatarInstructions,
  avatarStatus,
  AVATAR_PRESETS,
  type AvatarInstructions,
  type AvatarPreset,
  type Expression,
  type Gesture,
} from "./avatar";
export { InputInvalidError, KnowledgeNotFoundError, KnowledgeConfigError, VoiceSynthesisError } from "./errors";
export { loadCoreConfig, toBool, toInt, toList, type CoreConfig } from "./config";
export { createLogger, type Logger } from "./log";
export { withTimeout, TimeoutError } from "./time";
