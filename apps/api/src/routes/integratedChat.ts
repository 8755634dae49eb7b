// apps/api/src/routes/integratedChat.ts
import { Router } from "express";
import { z } from "zod";
import type { Orchestrator } from "@avatar-support/core";
import { parseBody, sendError } from "../http";
import { audioJson, chatJson } from "../serialize";

const body = z.object({
  message: z.string().trim().min(1).max(2000),
  language: z.string().optional(),
  include_voice: z.boolean().optional().default(false),
});

export function integratedChatRouter(deps: { orchestrator: Orchestrator }) {
  const router = Router();

  router.post("/api/integrated-chat", async (req, res) => {
    try {
      const b = parseBody(body, req.body);
      const out = await deps.orchestrator.handle({ message: b.message, language: b.language, includeVoice: b.include_voice });
      return res.json({
        ...chatJson(out),
        ...(out.audio ? { audio: audioJson(out.audio) } : {}),
        ...(out.voiceError ? { voice_error: out.voiceError } : {}),
      });
    } catch (e) {
      return sendError(res, "/api/integrated-chat", e);
    }
  });

  return router;
}
