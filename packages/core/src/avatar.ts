// packages/core/src/avatar.ts
import type { Intent } from "@avatar-support/knowledge";
import type { VoiceTone } from "@avatar-support/voice";
import type { Composition } from "./compose";

export type Expression =
  | "neutral"
  | "understanding"
  | "helpful"
  | "thinking"
  | "explaining"
  | "speaking"
  | "attentive"
  | "celebrating";

export type Gesture =
  | "none"
  | "welcoming"
  | "explaining"
  | "pointing"
  | "nodding"
  | "celebration"
  | "supportive"
  | "thinking_pose";

export type AvatarInstructions = {
  expression: Expression;
  gesture: Gesture;
  voiceTone: VoiceTone;
  animationDuration: number;
};

const BY_INTENT: Record<Intent, AvatarInstructions> = {
  greeting: { expression: "helpful", gesture: "welcoming", voiceTone: "warm", animationDuration: 3.5 },
  how_to: { expression: "explaining", gesture: "pointing", voiceTone: "clear", animationDuration: 5 },
  problem_solving: { expression: "thinking", gesture: "explaining", voiceTone: "focused", animationDuration: 4 },
  gratitude: { expression: "celebrating", gesture: "celebration", voiceTone: "excited", animationDuration: 3 },
  information: { expression: "helpful", gesture: "none", voiceTone: "professional", animationDuration: 3 },
};

const NO_MATCH: AvatarInstructions = { expression: "thinking", gesture: "none", voiceTone: "uncertain", animationDuration: 3 };

export function avatarInstructions(c: Pick<Composition, "matched" | "intent">): AvatarInstructions {
  if (!c.matched || !c.intent) return { ...NO_MATCH };
  return { ...BY_INTENT[c.intent] };
}

export type AvatarPreset = AvatarInstructions & { description: string };

export const AVATAR_PRESETS: Readonly<Record<string, AvatarPreset>> = {
  greeting: { expression: "helpful", gesture: "welcoming", voiceTone: "warm", animationDuration: 3, description: "Friendly greeting" },
  problem_solving: { expression: "thinking", gesture: "thinking_pose", voiceTone: "focused", animationDuration: 4, description: "Working through a problem" },
  explaining: { expression: "explaining", gesture: "pointing", voiceTone: "clear", animationDuration: 5, description: "Step-by-step explanation" },
  understanding: { expression: "understanding", gesture: "nodding", voiceTone: "empathetic", animationDuration: 2.5, description: "Acknowledging the user" },
  celebration: { expression: "celebrating", gesture: "celebration", voiceTone: "excited", animationDuration: 3, description: "Problem solved" },
  listening: { expression: "attentive", gesture: "none", voiceTone: "professional", animationDuration: 2, description: "Waiting for the user" },
};

export function avatarStatus(version: string) {
  return {
    name: "Mia",
    version,
    status: "active" as const,
    capabilities: ["conversation", "facial_expressions", "voice_synthesis", "gesture_animation", "tech_support"],
    expressions: [
      "neutral", "understanding", "helpful", "thinking", "explaining", "speaking", "attentive", "celebrating",
    ] satisfies Expression[],
    gestures: [
      "welcoming", "explaining", "pointing", "nodding", "celebration", "supportive", "thinking_pose",
    ] satisfies Gesture[],
    voiceTones: [
      "professional", "warm", "focused", "clear", "confirming", "excited", "empathetic",
    ] satisfies VoiceTone[],
    languages: ["en", "es"],
  };
}
