// Utilidad de logging con prefijo uniforme
const verbose = () => process.env.CORE_VERBOSE === "1" || process.env.VOICE_VERBOSE === "1";

export function dbg(...args: unknown[]) {
  if (verbose()) console.log("[voice]", ...args);
}

export function warn(...args: unknown[]) {
  console.warn("[voice]", ...args);
}
