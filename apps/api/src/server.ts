// apps/api/src/server.ts
import "./boot";

import { closeRedis } from "@avatar-support/cache";
import { loadCoreConfig } from "@avatar-support/core";
import { createApp } from "./app";
import { loadApiConfig } from "./config";
import { buildServices } from "./services";

const cfg = loadApiConfig();
const app = createApp(cfg, buildServices(loadCoreConfig()));

const server = app.listen(cfg.PORT, () => {
  console.log(`API listening on http://localhost:${cfg.PORT}`);
});

function shutdown(signal: string) {
  console.log(`[api] ${signal}: cerrando`);
  server.close(() => {
    void closeRedis()
      .catch((e: unknown) => console.warn("[cache] redis quit:", e instanceof Error ? e.message : e))
      .finally(() => process.exit(0));
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
