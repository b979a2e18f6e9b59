import { describe, test, expect, vi } from "vitest";
import { parseConfig, type Config } from "../src/config.js";
import { ConfigurationError } from "../src/llm/errors.js";
import type { LLMProvider, ProviderName } from "../src/llm/types.js";
import {
  SessionError,
  resolveProvider,
  resolveSession,
  type ProviderFactory,
  type SessionPrompter,
} from "../src/session.js";

function fakeProvider(name: ProviderName, models: string[]): LLMProvider {
  return {
    name,
    configure: () => {},
    getModels: async () => models,
    generateReview: async () => "review",
  };
}

function setup(env: NodeJS.ProcessEnv, models: string[] = ["model-a", "model-b"]) {
  const config: Config = parseConfig(env);
  const prompter = {
    confirmDefaults: vi.fn<SessionPrompter["confirmDefaults"]>(async () => true),
    chooseProvider: vi.fn<SessionPrompter["chooseProvider"]>(async () => "Anthropic"),
    chooseModel: vi.fn<SessionPrompter["chooseModel"]>(async (_provider, list) => list[list.length - 1]),
    askApiKey: vi.fn<SessionPrompter["askApiKey"]>(async () => "test-secret"),
    confirmSaveApiKey: vi.fn<SessionPrompter["confirmSaveApiKey"]>(async () => false),
  };
  const factory = vi.fn<ProviderFactory>((name) => fakeProvider(name, models));
  const store = { save: vi.fn(async (_entries: Record<string, string>) => {}) };
  return { config, prompter, factory, store, deps: { prompter, factory, store } };
}

describe("resolveSession", () => {
  test("explicit overrides win without prompting", async () => {
    const { config, prompter, factory, deps } = setup({
      CODEREVIEW_PROVIDER: "Google",
      CODEREVIEW_MODEL: "gemini-2.5-pro",
      OPENAI_API_KEY: "test-key",
    });

    const session = await resolveSession(config, { provider: "OpenAI", model: "gpt-4o" }, deps);

    expect(session.providerName).toBe("OpenAI");
    expect(session.modelName).toBe("gpt-4o");
    expect(factory).toHaveBeenCalledWith("OpenAI", "test-key", { openaiBaseURL: undefined });
    expect(prompter.confirmDefaults).not.toHaveBeenCalled();
    expect(prompter.chooseModel).not.toHaveBeenCalled();
  });

  test("uses stored defaults directly when asked to", async () => {
    const { config, prompter, deps } = setup({
      CODEREVIEW_PROVIDER: "Google",
      CODEREVIEW_MODEL: "gemini-2.5-pro",
      GOOGLE_API_KEY: "test-key",
    });

    const session = await resolveSession(config, { useDefaults: true }, deps);

    expect(session.providerName).toBe("Google");
    expect(session.modelName).toBe("gemini-2.5-pro");
    expect(prompter.confirmDefaults).not.toHaveBeenCalled();
  });

  test("offers stored defaults and falls back to choosing when declined", async () => {
    const { config, prompter, deps } = setup({
      CODEREVIEW_PROVIDER: "Google",
      CODEREVIEW_MODEL: "gemini-2.5-pro",
      ANTHROPIC_API_KEY: "test-key",
    });
    prompter.confirmDefaults.mockResolvedValue(false);

    const session = await resolveSession(config, {}, deps);

    expect(prompter.confirmDefaults).toHaveBeenCalledWith("Google", "gemini-2.5-pro");
    expect(prompter.chooseProvider).toHaveBeenCalledWith(["Google", "OpenAI", "Anthropic", "Grok"]);
    expect(prompter.chooseModel).toHaveBeenCalledWith("Anthropic", ["model-a", "model-b"]);
    expect(session.providerName).toBe("Anthropic");
    expect(session.modelName).toBe("model-b");
  });

  test("ignores the stored model when another provider is requested", async () => {
    const { config, prompter, deps } = setup({
      CODEREVIEW_PROVIDER: "Google",
      CODEREVIEW_MODEL: "gemini-2.5-pro",
      XAI_API_KEY: "test-key",
    });

    const session = await resolveSession(config, { provider: "Grok" }, deps);

    expect(prompter.confirmDefaults).not.toHaveBeenCalled();
    expect(prompter.chooseModel).toHaveBeenCalledWith("Grok", ["model-a", "model-b"]);
    expect(session.modelName).toBe("model-b");
  });

  test("asks for a missing credential and saves it when allowed", async () => {
    const { config, prompter, factory, store, deps } = setup({});
    prompter.chooseProvider.mockResolvedValue("Grok");
    prompter.confirmSaveApiKey.mockResolvedValue(true);

    await resolveSession(config, { model: "grok-3" }, deps);

    expect(prompter.askApiKey).toHaveBeenCalledWith("Grok");
    expect(prompter.confirmSaveApiKey).toHaveBeenCalledWith("Grok", "XAI_API_KEY");
    expect(store.save).toHaveBeenCalledWith({ XAI_API_KEY: "test-secret" });
    expect(factory).toHaveBeenCalledWith("Grok", "test-secret", { openaiBaseURL: undefined });
  });

  test("does not save a prompted credential when declined", async () => {
    const { config, store, deps } = setup({});

    await resolveSession(config, { provider: "OpenAI", model: "gpt-4o" }, deps);

    expect(store.save).not.toHaveBeenCalled();
  });

  test("fails on a blank credential", async () => {
    const { config, prompter, factory, deps } = setup({});
    prompter.askApiKey.mockResolvedValue("   ");

    await expect(resolveSession(config, { provider: "OpenAI" }, deps)).rejects.toThrow(
      new SessionError("An API key is required for OpenAI")
    );
    expect(factory).not.toHaveBeenCalled();
  });

  test("fails when the provider offers no models", async () => {
    const { config, deps } = setup({ GOOGLE_API_KEY: "test-key" }, []);

    await expect(resolveSession(config, { provider: "Google" }, deps)).rejects.toThrow(
      "No models available for Google"
    );
  });

  test("propagates configuration errors from the factory", async () => {
    const { config, factory, deps } = setup({ OPENAI_API_KEY: "test-key" });
    factory.mockImplementation(() => {
      throw new ConfigurationError("OpenAI", "invalid key");
    });

    await expect(
      resolveSession(config, { provider: "OpenAI", model: "gpt-4o" }, deps)
    ).rejects.toBeInstanceOf(ConfigurationError);
  });

  test("passes the OpenAI endpoint override to the factory", async () => {
    const { config, factory, deps } = setup({
      OPENAI_API_KEY: "test-key",
      OPENAI_BASE_URL: "http://localhost:8080/v1",
    });

    await resolveSession(config, { provider: "OpenAI", model: "local" }, deps);

    expect(factory).toHaveBeenCalledWith("OpenAI", "test-key", {
      openaiBaseURL: "http://localhost:8080/v1",
    });
  });
});

describe("resolveProvider", () => {
  test("returns the stored default model without listing models", async () => {
    const { config, deps } = setup({
      CODEREVIEW_PROVIDER: "Anthropic",
      CODEREVIEW_MODEL: "claude-opus-4-0",
      ANTHROPIC_API_KEY: "test-key",
    });

    const result = await resolveProvider(config, { useDefaults: true }, deps);

    expect(result.providerName).toBe("Anthropic");
    expect(result.defaultModel).toBe("claude-opus-4-0");
  });
});
