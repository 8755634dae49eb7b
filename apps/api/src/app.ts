// apps/api/src/app.ts
import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";
import type { ApiConfig } from "./config";
import type { Services } from "./services";
import { errMsg } from "./http";
import { conversationRouter } from "./routes/conversation";
import { voiceRouter } from "./routes/voice";
import { knowledgeRouter } from "./routes/knowledge";
import { avatarRouter } from "./routes/avatar";
import { integratedChatRouter } from "./routes/integratedChat";

const isBodyParseError = (e: unknown) =>
  e instanceof SyntaxError && "type" in e && e.type === "entity.parse.failed";

export function createApp(cfg: ApiConfig, services: Services) {
  const app = express();

  app.use(cors({
    origin: cfg.WEB_ORIGINS.length ? cfg.WEB_ORIGINS : true,
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type"],
  }));
  app.use(express.json({ limit: "100kb" }));
  if (cfg.RATE_LIMIT_PER_MINUTE > 0) {
    app.use(rateLimit({ windowMs: 60_000, limit: cfg.RATE_LIMIT_PER_MINUTE, standardHeaders: true, legacyHeaders: false }));
  }

  app.get("/health", (_req, res) =>
    res.json({ status: "healthy", service: cfg.SERVICE_NAME, version: cfg.VERSION })
  );

  app.use(conversationRouter(services));
  app.use(voiceRouter(services));
  app.use(knowledgeRouter(services));
  app.use(avatarRouter({ version: cfg.VERSION, voiceProvider: services.voice.provider }));
  app.use(integratedChatRouter(services));

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: "not_found", path: req.path });
  });

  // JSON mal formado llega aquí desde express.json()
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      return res.status(400).json({ error: "invalid_input", detail: errMsg(err) });
    }
    console.error(`[${req.path}] error:`, err);
    return res.status(500).json({ error: "internal_error", detail: errMsg(err) });
  });

  return app;
}
