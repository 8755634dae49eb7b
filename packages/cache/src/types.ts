export type CachedAudio = {
  base64: string;
  contentType: string;
  format: string;
  provider: string;
  voiceId: string;
  createdAt: number;
};

export interface AudioCache {
  get(key: string): Promise<CachedAudio | null>;
  set(key: string, value: CachedAudio, ttlSeconds?: number): Promise<void>;
}
