// apps/api/src/boot.ts
// Se importa antes que nada: deja process.env listo para los loaders de config.
import * as dotenv from "dotenv";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";

const appDir = resolve(dirname(fileURLToPath(import.meta.url)), "..");
const repoDir = resolve(appDir, "..", "..");

// orden: el entorno del proceso manda, luego el .env de la raíz y por último el de apps/api
const sources = [
  { label: "raíz", path: resolve(repoDir, ".env"), override: false },
  { label: "apps/api", path: resolve(appDir, ".env"), override: true },
];

const found = sources.filter((s) => !dotenv.config({ path: s.path, override: s.override }).error).map((s) => s.label);

if (process.env.CORE_VERBOSE === "1") {
  console.log(`[boot] .env cargados: ${found.join(", ") || "ninguno"}`);
}
