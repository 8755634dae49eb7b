import { describe, expect, it, vi } from "vitest";
import { createOrchestrator, InputInvalidError } from "@avatar-support/core";
import { loadKnowledgeBase } from "@avatar-support/knowledge";
import {
  createMockVoiceClient,
  estimateDuration,
  optimizeForSpeech,
  VoiceSynthesisError,
  type SynthesizedAudio,
  type VoiceSynthesisClient,
} from "@avatar-support/voice";
import { failingClient, okClient, silentLogger } from "./helpers";

const knowledge = loadKnowledgeBase();
const install = knowledge.get("xeta_router_installation");

describe("ConversationOrchestrator", () => {
  it("answers in the requested language", async () => {
    const o = createOrchestrator({ knowledge, log: silentLogger() });
    const out = await o.handle({ message: "How do I install XETA?", language: "en" });

    expect(out.replyText).toBe(install?.text.en);
    expect(out.languageUsed).toBe("en");
    expect(out.topic).toBe("xeta_router_installation");
    expect(out.matched).toBe(true);
    expect(out.avatar).toEqual({ expression: "explaining", gesture: "pointing", voiceTone: "clear", animationDuration: 5 });
    expect(out.audio).toBeUndefined();
  });

  it("detects Spanish when the language is auto", async () => {
    const o = createOrchestrator({ knowledge, log: silentLogger() });
    const out = await o.handle({ message: "¿Cómo instalo XETA?", language: "auto" });
    expect(out.languageUsed).toBe("es");
    expect(out.replyText).toBe(install?.text.es);
  });

  it("never calls the voice client when voice is not requested", async () => {
    const { client } = okClient();
    const o = createOrchestrator({ knowledge, voice: client, log: silentLogger() });

    await o.handle({ message: "Hello!", language: "en", includeVoice: false });
    await o.handle({ message: "Hola", language: "es" });

    expect(client.synthesize).not.toHaveBeenCalled();
  });

  it("attaches audio with timing when synthesis works", async () => {
    const { client, calls } = okClient();
    const o = createOrchestrator({ knowledge, voice: client, log: silentLogger() });

    const out = await o.handle({ message: "¿Cómo instalo XETA?", language: "auto", includeVoice: true });
    const spoken = optimizeForSpeech(install?.text.es ?? "", "es");

    expect(calls).toEqual([{ text: spoken, voice: "professional_female_es" }]);
    expect(out.audio?.base64).toBe(Buffer.from("fake-mp3").toString("base64"));
    expect(out.audio?.voiceProfile).toBe("professional_female_es");
    expect(out.audio?.durationEstimate).toBe(estimateDuration(spoken));
    expect(out.audio?.timing.wordCount).toBe(spoken.split(" ").length);
    expect(out.audio?.cached).toBe(false);
    expect(out.voiceError).toBeUndefined();
  });

  it("uses the tone chosen for the avatar", async () => {
    const { client, calls } = okClient();
    const o = createOrchestrator({ knowledge, voice: client, log: silentLogger() });
    await o.handle({ message: "Hello!", includeVoice: true });
    await o.handle({ message: "blorp", includeVoice: true });
    expect(calls.map((c) => c.voice)).toEqual(["warm_friendly_en", "warm_friendly_en"]);
  });

  it("degrades to text when the provider rejects the request", async () => {
    const { client, synthesize } = failingClient("auth");
    const log = silentLogger();
    const o = createOrchestrator({ knowledge, voice: client, log });

    const out = await o.handle({ message: "How do I install XETA?", language: "en", includeVoice: true });

    expect(out.replyText).toBe(install?.text.en);
    expect(out.audio).toBeUndefined();
    expect(out.voiceError).toEqual({ kind: "auth", message: "fallo simulado: auth" });
    expect(synthesize).toHaveBeenCalledTimes(1);
    expect(log.warn).toHaveBeenCalledWith("voice auth: fallo simulado: auth");
  });

  it("retries a transient failure once before giving up", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const { client, synthesize } = failingClient("network");
    const o = createOrchestrator({ knowledge, voice: client, log: silentLogger() });

    const out = await o.handle({ message: "Hello!", includeVoice: true });

    expect(out.replyText).toBe(knowledge.get("greeting")?.text.en);
    expect(out.voiceError?.kind).toBe("network");
    expect(synthesize).toHaveBeenCalledTimes(2);
    vi.restoreAllMocks();
  });

  it("treats a synthesis that outlives its budget as a timeout", async () => {
    const hanging: VoiceSynthesisClient = {
      provider: "elevenlabs",
      synthesize: () => new Promise(() => undefined),
    };
    const o = createOrchestrator({ knowledge, voice: hanging, voiceBudgetMs: 20, log: silentLogger() });

    const out = await o.handle({ message: "Hello!", includeVoice: true });

    expect(out.audio).toBeUndefined();
    expect(out.voiceError?.kind).toBe("timeout");
  });

  it("stops retrying once the budget has run out", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const synthesize = vi.fn(
      (): Promise<SynthesizedAudio> =>
        new Promise((_, reject) => setTimeout(() => reject(new VoiceSynthesisError("network", "lento y roto")), 40))
    );
    const o = createOrchestrator({ knowledge, voice: { provider: "elevenlabs", synthesize }, voiceBudgetMs: 20, log: silentLogger() });

    const out = await o.handle({ message: "Hello!", includeVoice: true });
    expect(out.voiceError?.kind).toBe("timeout");

    await new Promise((r) => setTimeout(r, 80));
    expect(synthesize).toHaveBeenCalledTimes(1);
    expect(warn).not.toHaveBeenCalled();
    vi.restoreAllMocks();
  });

  it("reports a missing voice client without failing", async () => {
    const o = createOrchestrator({ knowledge, log: silentLogger() });
    const out = await o.handle({ message: "Hello!", includeVoice: true });
    expect(out.voiceError?.kind).toBe("provider");
    expect(out.replyText).toBe(knowledge.get("greeting")?.text.en);
  });

  it("passes mock audio through", async () => {
    const o = createOrchestrator({ knowledge, voice: createMockVoiceClient(), log: silentLogger() });
    const out = await o.handle({ message: "gracias", includeVoice: true });
    expect(out.languageUsed).toBe("es");
    expect(out.audio?.mock).toBe(true);
    expect(out.audio?.provider).toBe("mock");
    expect(out.audio?.voiceProfile).toBe("encouraging_supportive_es");
  });

  it("falls back to the generic reply for unknown questions", async () => {
    const o = createOrchestrator({ knowledge, log: silentLogger() });
    const out = await o.handle({ message: "¿Qué tiempo hará mañana?", language: "auto" });
    expect(out).toMatchObject({
      replyText: "Lo siento, no entendí eso. ¿Podrías reformular tu pregunta por favor?",
      languageUsed: "es",
      topic: null,
      matched: false,
    });
    expect(out.avatar.voiceTone).toBe("uncertain");
  });

  it("rejects blank messages", async () => {
    const o = createOrchestrator({ knowledge, log: silentLogger() });
    await expect(o.handle({ message: "   " })).rejects.toBeInstanceOf(InputInvalidError);
  });

  describe("speak", () => {
    it("uses an explicit voice profile", async () => {
      const { client, calls } = okClient();
      const o = createOrchestrator({ knowledge, voice: client, log: silentLogger() });
      const audio = await o.speak("Check the USB cable", { language: "en", voiceKey: "confident_expert_en" });
      expect(calls).toEqual([{ text: "Check the U-S-B cable", voice: "confident_expert_en" }]);
      expect(audio.durationEstimate).toBe(1.6);
    });

    it("rejects unknown voices as invalid input", async () => {
      const o = createOrchestrator({ knowledge, voice: createMockVoiceClient(), log: silentLogger() });
      await expect(o.speak("Hi", { language: "en", voiceKey: "robot" })).rejects.toBeInstanceOf(InputInvalidError);
    });

    it("surfaces provider failures as VoiceSynthesisError", async () => {
      const { client } = failingClient("quota");
      const o = createOrchestrator({ knowledge, voice: client, log: silentLogger() });
      await expect(o.speak("Hi", { language: "en" })).rejects.toBeInstanceOf(VoiceSynthesisError);
    });
  });
});
