// apps/api/src/config.ts
import { toInt, toList } from "@avatar-support/core";

type Env = Record<string, string | undefined>;

export type ApiConfig = {
  PORT: number;
  SERVICE_NAME: string;
  VERSION: string;
  /** vacío = cualquier origen */
  WEB_ORIGINS: string[];
  /** peticiones por minuto e IP; 0 = sin límite */
  RATE_LIMIT_PER_MINUTE: number;
};

export function loadApiConfig(env: Env = process.env): ApiConfig {
  return {
    PORT: toInt(env.PORT, 3001),
    SERVICE_NAME: "avatar-support",
    VERSION: env.APP_VERSION || "1.0.0",
    WEB_ORIGINS: toList(env.WEB_ORIGIN),
    RATE_LIMIT_PER_MINUTE: Math.max(0, toInt(env.RATE_LIMIT_PER_MINUTE, 30)),
  };
}
