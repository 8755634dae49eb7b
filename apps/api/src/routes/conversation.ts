// apps/api/src/routes/conversation.ts
import { Router } from "express";
import { z } from "zod";
import type { Orchestrator } from "@avatar-support/core";
import { parseBody, sendError } from "../http";
import { chatJson } from "../serialize";

const chatBody = z.object({
  message: z.string().trim().min(1).max(2000),
  language: z.string().optional(),
});

export function conversationRouter(deps: { orchestrator: Orchestrator }) {
  const router = Router();

  router.post("/api/conversation/chat", async (req, res) => {
    try {
      const body = parseBody(chatBody, req.body);
      const out = await deps.orchestrator.handle({ message: body.message, language: body.language, includeVoice: false });
      return res.json(chatJson(out));
    } catch (e) {
      return sendError(res, "/api/conversation/chat", e);
    }
  });

  return router;
}
