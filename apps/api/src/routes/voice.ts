// apps/api/src/routes/voice.ts
import { Router } from "express";
import { z } from "zod";
import { resolveLanguage, VoiceSynthesisError, type Orchestrator } from "@avatar-support/core";
import { getVoiceProfile, VOICE_PROFILES, type VoiceSynthesisClient } from "@avatar-support/voice";
import { parseBody, sendError } from "../http";
import { audioJson } from "../serialize";

const synthBody = z.object({
  text: z.string().trim().min(1).max(5000),
  voice: z.string().trim().min(1).optional(), // key de perfil, p.ej. "warm_friendly_es"
  tone: z.string().trim().min(1).optional(),
  language: z.string().optional(),
});

export function voiceRouter(deps: { orchestrator: Orchestrator; voice: VoiceSynthesisClient }) {
  const router = Router();

  router.post("/api/voice/synthesize", async (req, res) => {
    try {
      const b = parseBody(synthBody, req.body);
      const language = (b.voice && getVoiceProfile(b.voice)?.language) || resolveLanguage(b.language, b.text);
      const audio = await deps.orchestrator.speak(b.text, { language, tone: b.tone, voiceKey: b.voice });
      return res.json(audioJson(audio));
    } catch (e) {
      if (e instanceof VoiceSynthesisError) {
        console.warn(`[/api/voice/synthesize] ${e.kind}: ${e.message}`);
        return res.status(502).json({ error: "voice_synthesis_failed", kind: e.kind, detail: e.message });
      }
      return sendError(res, "/api/voice/synthesize", e);
    }
  });

  router.get("/api/voice/voices", (_req, res) => {
    res.json({
      provider: deps.voice.provider,
      voices: VOICE_PROFILES.map((p) => ({
        key: p.key,
        name: p.name,
        description: p.description,
        language: p.language,
        style: p.style,
        voice_id: deps.voice.provider === "openai" ? p.ids.openai : p.ids.elevenlabs,
      })),
    });
  });

  return router;
}
