import { createClient } from "redis";
import { REDIS_CONNECT_TIMEOUT_MS, REDIS_MAX_RECONNECTS, REDIS_URL } from "./constants";

export type Redis = ReturnType<typeof createClient>;

const clients = new Map<string, Redis>();
const connecting = new Map<string, Promise<Redis>>();

/** Un cliente por URL, conectado perezosamente la primera vez que se pide */
export async function getRedis(url = REDIS_URL || "redis://localhost:6379"): Promise<Redis> {
  const ready = clients.get(url);
  if (ready) return ready;

  let pending = connecting.get(url);
  if (!pending) {
    const client = createClient({
      url,
      // sin cola offline: con la conexión caída los comandos fallan al momento
      disableOfflineQueue: true,
      socket: {
        connectTimeout: REDIS_CONNECT_TIMEOUT_MS,
        reconnectStrategy: (retries: number) =>
          retries >= REDIS_MAX_RECONNECTS
            ? new Error(`redis inalcanzable tras ${retries} reintentos`)
            : Math.min(100 * 2 ** retries, 1000),
      },
    });
    client.on("error", (e: unknown) => console.warn("[cache] redis error:", e instanceof Error ? e.message : e));
    client.on("end", () => {
      if (clients.get(url) === client) clients.delete(url);
    });
    pending = client.connect().then(
      () => {
        clients.set(url, client);
        return client;
      },
      (e: unknown) => {
        connecting.delete(url);
        throw e;
      }
    );
    connecting.set(url, pending);
  }
  return pending;
}

export async function closeRedis() {
  const all = [...clients.values()];
  clients.clear();
  connecting.clear();
  await Promise.all(all.map((c) => c.quit()));
}
