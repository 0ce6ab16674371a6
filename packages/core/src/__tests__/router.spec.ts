import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { ChatOllama } from "@langchain/ollama";
import { LLMRouter } from "../llm/router.js";
import { ConfigurationError, ProviderUnavailableError } from "../llm/errors.js";
import { DEFAULT_MODELS } from "../llm/types.js";
import { loadBaseConfig } from "../config/index.js";

const VARS = ["LLM_PROVIDER", "LLM_MODEL", "ANTHROPIC_API_KEY", "ANTHROPIC_BASE_URL", "OLLAMA_BASE_URL"] as const;

describe("LLMRouter", () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const name of VARS) {
      saved[name] = process.env[name];
      delete process.env[name];
    }
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    for (const name of VARS) {
      const value = saved[name];
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }
  });

  it("falls back to Ollama when no Anthropic key is set", () => {
    const router = new LLMRouter();

    expect(router.getProviderInfo()).toEqual({
      provider: "ollama",
      model: DEFAULT_MODELS.ollama,
      isLocal: true,
    });
    expect(router.getModel()).toBeInstanceOf(ChatOllama);
  });

  it("prefers Anthropic when a key is present", () => {
    process.env.ANTHROPIC_API_KEY = "test-secret";

    const router = new LLMRouter();

    expect(router.getConfig().provider).toBe("anthropic");
    expect(router.getConfig().model).toBe(DEFAULT_MODELS.anthropic);
  });

  it("rejects an unknown provider from the environment", () => {
    process.env.LLM_PROVIDER = "gpt";

    try {
      new LLMRouter();
      expect.unreachable("constructor should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ missingKey: "LLM_PROVIDER" });
    }
  });

  it("requires an API key for the Anthropic provider", () => {
    expect(() => new LLMRouter({ provider: "anthropic" })).toThrow(ConfigurationError);
  });

  it("keeps per-call overrides out of the stored config", () => {
    const router = new LLMRouter({ temperature: 0.5 });

    router.getModel({ temperature: 0 });

    expect(router.getConfig().temperature).toBe(0.5);
  });

  it("reads provider variables from an injected environment", () => {
    const router = new LLMRouter({}, { ANTHROPIC_API_KEY: "test-secret", LLM_MODEL: "claude-test" });

    expect(router.getProviderInfo()).toEqual({ provider: "anthropic", model: "claude-test", isLocal: false });
    expect(process.env.ANTHROPIC_API_KEY).toBeUndefined();
  });

  it("checks credentials again when a call switches provider", () => {
    const router = new LLMRouter();

    expect(() => router.getModel({ provider: "anthropic" })).toThrow(ConfigurationError);
  });

  describe("fromConfig", () => {
    it("takes temperature, model and endpoint from the loaded config", async () => {
      const config = loadBaseConfig({
        LLM_TEMPERATURE: "0.1",
        LLM_MODEL: "llama-test",
        OLLAMA_BASE_URL: "http://ollama.test:11434",
      });
      const fetchMock = vi.fn(async (_url: string) => new Response(null, { status: 200 }));
      vi.stubGlobal("fetch", fetchMock);

      const router = LLMRouter.fromConfig(config, {});

      expect(router.getConfig()).toMatchObject({ provider: "ollama", model: "llama-test", temperature: 0.1 });
      await router.assertAvailable();
      expect(fetchMock).toHaveBeenCalledWith("http://ollama.test:11434/api/tags");
    });

    it("picks Anthropic from the key when the config names no provider", () => {
      const router = LLMRouter.fromConfig(loadBaseConfig({}), { ANTHROPIC_API_KEY: "test-secret" });

      expect(router.getProviderInfo().provider).toBe("anthropic");
    });
  });

  describe("assertAvailable", () => {
    it("passes for Anthropic once a key is set", async () => {
      process.env.ANTHROPIC_API_KEY = "test-secret";
      await expect(new LLMRouter().assertAvailable()).resolves.toBeUndefined();
    });

    it("names the Ollama endpoint that did not answer", async () => {
      process.env.OLLAMA_BASE_URL = "http://ollama.test:11434";
      const fetchMock = vi.fn(async (_url: string) => new Response(null, { status: 503 }));
      vi.stubGlobal("fetch", fetchMock);

      const failure = new LLMRouter().assertAvailable();

      await expect(failure).rejects.toBeInstanceOf(ProviderUnavailableError);
      await expect(failure).rejects.toThrow(
        "LLM provider 'ollama' is unavailable: no Ollama server answering at http://ollama.test:11434"
      );
      expect(fetchMock).toHaveBeenCalledWith("http://ollama.test:11434/api/tags");
    });
  });
});
