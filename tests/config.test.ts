import { afterEach, describe, expect, it, vi } from "vitest";
import { loadCoreConfig, toBool, toInt, toList } from "@avatar-support/core";
import { loadApiConfig } from "../apps/api/src/config";
import { buildServices } from "../apps/api/src/services";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("env helpers", () => {
  it("parses booleans, integers and lists with defaults", () => {
    expect(toBool("YES")).toBe(true);
    expect(toBool("off", true)).toBe(false);
    expect(toBool("maybe", true)).toBe(true);
    expect(toInt("42", 1)).toBe(42);
    expect(toInt("abc", 7)).toBe(7);
    expect(toList(" a, b ,,c ")).toEqual(["a", "b", "c"]);
    expect(toList("", ["x"])).toEqual(["x"]);
  });
});

describe("loadCoreConfig", () => {
  it("uses defaults for an empty environment", () => {
    const cfg = loadCoreConfig({});
    expect(cfg.VERBOSE).toBe(false);
    expect(cfg.KNOWLEDGE_FILE).toBeUndefined();
    expect(cfg.VOICE).toEqual({
      PROVIDER: "auto",
      TIMEOUT_MS: 15000,
      RETRIES: 1,
      ELEVENLABS: {
        API_KEY: "",
        MODEL: "eleven_multilingual_v2",
        OUTPUT_FORMAT: "mp3_44100_128",
        BASE_URL: "https://api.elevenlabs.io",
      },
      OPENAI: { API_KEY: "", MODEL: "tts-1" },
      CACHE: { ENABLED: false, TTL_SECONDS: 86400, SCOPE: "default" },
    });
  });

  it("reads provider settings and ignores unknown providers", () => {
    expect(loadCoreConfig({ VOICE_PROVIDER: "OpenAI" }).VOICE.PROVIDER).toBe("openai");
    expect(loadCoreConfig({ VOICE_PROVIDER: "polly" }).VOICE.PROVIDER).toBe("auto");
    expect(loadCoreConfig({ VOICE_TIMEOUT_MS: "2500", VOICE_RETRIES: "0" }).VOICE).toMatchObject({ TIMEOUT_MS: 2500, RETRIES: 0 });
  });
});

describe("loadApiConfig", () => {
  it("reads port, origins and rate limit", () => {
    expect(loadApiConfig({ PORT: "8080", WEB_ORIGIN: "http://a.test, http://b.test", RATE_LIMIT_PER_MINUTE: "-5" })).toEqual({
      PORT: 8080,
      SERVICE_NAME: "avatar-support",
      VERSION: "1.0.0",
      WEB_ORIGINS: ["http://a.test", "http://b.test"],
      RATE_LIMIT_PER_MINUTE: 0,
    });
    expect(loadApiConfig({}).RATE_LIMIT_PER_MINUTE).toBe(30);
  });
});

describe("buildServices", () => {
  it("wires knowledge, a mock voice and the orchestrator", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const s = buildServices(loadCoreConfig({ VOICE_PROVIDER: "mock" }), {});

    expect(s.voice.provider).toBe("mock");
    expect(s.knowledge.entries).toHaveLength(14);
    const out = await s.orchestrator.handle({ message: "Hello!", includeVoice: true });
    expect(out.audio?.mock).toBe(true);
  });
});

describe("boot", () => {
  it("reports which .env files it loaded when verbose", async () => {
    vi.stubEnv("CORE_VERBOSE", "1");
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    await import("../apps/api/src/boot");

    expect(log).toHaveBeenCalledWith(expect.stringMatching(/^\[boot\] \.env cargados: /));
    vi.unstubAllEnvs();
  });
});
