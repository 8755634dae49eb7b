// apps/api/src/routes/avatar.ts
import { Router } from "express";
import { AVATAR_PRESETS, avatarStatus } from "@avatar-support/core";
import type { ProviderName } from "@avatar-support/voice";
import { presetJson } from "../serialize";

export function avatarRouter(deps: { version: string; voiceProvider: ProviderName }) {
  const router = Router();

  router.get("/api/avatar/status", (_req, res) => {
    const s = avatarStatus(deps.version);
    res.json({
      name: s.name,
      version: s.version,
      status: s.status,
      capabilities: s.capabilities,
      expressions: s.expressions,
      gestures: s.gestures,
      voice_tones: s.voiceTones,
      languages: s.languages,
      voice_provider: deps.voiceProvider,
    });
  });

  router.get("/api/avatar/presets", (_req, res) => {
    const presets = Object.fromEntries(Object.entries(AVATAR_PRESETS).map(([k, p]) => [k, presetJson(p)]));
    res.json({ presets, count: Object.keys(presets).length });
  });

  return router;
}
