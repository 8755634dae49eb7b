export class TimeoutError extends Error {
  constructor(readonly ms: number, readonly label: string) {
    super(`Timeout ${ms}ms en ${label}`);
    this.name = "TimeoutError";
  }
}

export function withTimeout<T>(p: Promise<T>, ms: number, label: string): Promise<T> {
  let t: NodeJS.Timeout | undefined;
  const killer = new Promise<never>((_, rej) => {
    t = setTimeout(() => rej(new TimeoutError(ms, label)), ms);
  });
  return Promise.race([p, killer]).finally(() => clearTimeout(t));
}
