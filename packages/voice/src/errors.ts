// packages/voice/src/errors.ts
export type VoiceErrorKind = "timeout" | "auth" | "quota" | "network" | "provider" | "invalid_input";

const TRANSIENT: ReadonlySet<VoiceErrorKind> = new Set(["timeout", "network", "provider"]);

export class VoiceSynthesisError extends Error {
  readonly code = "VOICE_SYNTHESIS";
  readonly transient: boolean;

  constructor(
    readonly kind: VoiceErrorKind,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown; transient?: boolean }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "VoiceSynthesisError";
    this.transient = options?.transient ?? TRANSIENT.has(kind);
  }
}
