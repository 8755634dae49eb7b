// packages/core/src/errors.ts
export class InputInvalidError extends Error {
  readonly code = "INPUT_INVALID";

  constructor(message: string) {
    super(message);
    this.name = "InputInvalidError";
  }
}

export { KnowledgeNotFoundError, KnowledgeConfigError } from "@avatar-support/knowledge";
export { VoiceSynthesisError } from "@avatar-support/voice";
