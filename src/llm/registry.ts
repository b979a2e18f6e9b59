import { PROVIDER_NAMES, type LLMProvider, type ProviderName } from "./types.js";
import type { ProviderOptions } from "./providers/base.js";
import { UnknownProviderError } from "./errors.js";
import { GROK_BASE_URL, OpenAIProvider } from "./providers/openai.js";
import { AnthropicProvider } from "./providers/anthropic.js";
import { GeminiProvider } from "./providers/gemini.js";

export { PROVIDER_NAMES };

export interface CreateProviderOptions extends ProviderOptions {
  /** Replaces the OpenAI endpoint; Grok always uses its own. */
  openaiBaseURL?: string;
}

interface ProviderEntry {
  /** Environment variable holding the credential. */
  envKey: string;
  create(apiKey: string, options: CreateProviderOptions): LLMProvider;
}

const providers: Record<ProviderName, ProviderEntry> = {
  Google: {
    envKey: "GOOGLE_API_KEY",
    create: (apiKey, options) =>
      new GeminiProvider(apiKey, { output: options.output }),
  },
  OpenAI: {
    envKey: "OPENAI_API_KEY",
    create: (apiKey, options) =>
      new OpenAIProvider(apiKey, {
        output: options.output,
        baseURL: options.openaiBaseURL,
      }),
  },
  Anthropic: {
    envKey: "ANTHROPIC_API_KEY",
    create: (apiKey, options) =>
      new AnthropicProvider(apiKey, { output: options.output }),
  },
  Grok: {
    envKey: "XAI_API_KEY",
    create: (apiKey, options) =>
      new OpenAIProvider(apiKey, {
        output: options.output,
        name: "Grok",
        baseURL: GROK_BASE_URL,
      }),
  },
};

export function isProviderName(value: string): value is ProviderName {
  const names: readonly string[] = PROVIDER_NAMES;
  return names.includes(value);
}

function getEntry(name: string): ProviderEntry {
  if (!isProviderName(name)) {
    throw new UnknownProviderError(name);
  }
  return providers[name];
}

/**
 * Builds and configures the adapter for `name`. A rejected credential
 * surfaces here as a ConfigurationError.
 */
export function createProvider(
  name: string,
  apiKey: string,
  options: CreateProviderOptions = {}
): LLMProvider {
  return getEntry(name).create(apiKey, options);
}

export function credentialEnvKey(name: ProviderName): string {
  return getEntry(name).envKey;
}

export function listProviders(): ProviderName[] {
  return [...PROVIDER_NAMES];
}
