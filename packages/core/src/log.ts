// Utilidad de logging con prefijo uniforme
export type Logger = {
  dbg(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
};

export function createLogger(tag: string, verbose: boolean | (() => boolean) = () => process.env.CORE_VERBOSE === "1"): Logger {
  const on = typeof verbose === "function" ? verbose : () => verbose;
  return {
    dbg: (...args) => {
      if (on()) console.log(`[${tag}]`, ...args);
    },
    warn: (...args) => console.warn(`[${tag}]`, ...args),
    error: (...args) => console.error(`[${tag}]`, ...args),
  };
}
