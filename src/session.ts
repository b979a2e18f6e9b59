import type { Config } from "./config.js";
import type { LLMProvider, ProviderName } from "./llm/types.js";
import {
  PROVIDER_NAMES,
  createProvider,
  credentialEnvKey,
  type CreateProviderOptions,
} from "./llm/registry.js";
import { logger } from "./logger.js";

export interface SessionOverrides {
  provider?: ProviderName;
  model?: string;
  /** Take the stored defaults without asking. */
  useDefaults?: boolean;
}

/** The interactive side of session selection. */
export interface SessionPrompter {
  confirmDefaults(provider: ProviderName, model?: string): Promise<boolean>;
  chooseProvider(choices: readonly ProviderName[]): Promise<ProviderName>;
  chooseModel(provider: ProviderName, models: string[]): Promise<string>;
  askApiKey(provider: ProviderName): Promise<string>;
  confirmSaveApiKey(provider: ProviderName, envKey: string): Promise<boolean>;
}

export interface CredentialStore {
  save(entries: Record<string, string>): Promise<void>;
}

export type ProviderFactory = (
  name: ProviderName,
  apiKey: string,
  options: CreateProviderOptions
) => LLMProvider;

export interface SessionDeps {
  prompter: SessionPrompter;
  store?: CredentialStore;
  factory?: ProviderFactory;
  providerOptions?: CreateProviderOptions;
}

export interface Session {
  providerName: ProviderName;
  modelName: string;
  provider: LLMProvider;
}

export class SessionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SessionError";
  }
}

async function resolveDefaults(
  config: Config,
  overrides: SessionOverrides,
  prompter: SessionPrompter
): Promise<Config["defaults"]> {
  const { provider, model } = config.defaults;
  if (!provider) return {};
  // An explicit provider different from the stored one makes the stored model meaningless.
  if (overrides.provider && overrides.provider !== provider) return {};
  if (overrides.provider && overrides.model) return {};
  if (overrides.useDefaults) return { provider, model };
  return (await prompter.confirmDefaults(provider, model))
    ? { provider, model }
    : {};
}

async function resolveApiKey(
  config: Config,
  providerName: ProviderName,
  deps: SessionDeps
): Promise<string> {
  const configured = config.apiKeys[providerName];
  if (configured) return configured;

  const apiKey = (await deps.prompter.askApiKey(providerName)).trim();
  if (!apiKey) {
    throw new SessionError(`An API key is required for ${providerName}`);
  }

  const envKey = credentialEnvKey(providerName);
  if (deps.store && (await deps.prompter.confirmSaveApiKey(providerName, envKey))) {
    await deps.store.save({ [envKey]: apiKey });
    logger.info("API key saved", { provider: providerName, envKey });
  }
  return apiKey;
}

/** Picks the provider and builds its adapter; the model is left to the caller. */
export async function resolveProvider(
  config: Config,
  overrides: SessionOverrides,
  deps: SessionDeps
): Promise<Omit<Session, "modelName"> & { defaultModel?: string }> {
  const defaults = await resolveDefaults(config, overrides, deps.prompter);

  const providerName =
    overrides.provider ??
    defaults.provider ??
    (await deps.prompter.chooseProvider(PROVIDER_NAMES));

  const apiKey = await resolveApiKey(config, providerName, deps);
  const factory = deps.factory ?? createProvider;
  const provider = factory(providerName, apiKey, {
    openaiBaseURL: config.openaiBaseURL,
    ...deps.providerOptions,
  });

  return { providerName, provider, defaultModel: defaults.model };
}

/**
 * Picks the provider, credential and model for this run. For provider and
 * model an explicit override wins, then the stored default, then an
 * interactive choice. A ConfigurationError from the factory propagates.
 */
export async function resolveSession(
  config: Config,
  overrides: SessionOverrides,
  deps: SessionDeps
): Promise<Session> {
  const { providerName, provider, defaultModel } = await resolveProvider(
    config,
    overrides,
    deps
  );

  let modelName = overrides.model ?? defaultModel;
  if (!modelName) {
    const models = await provider.getModels();
    if (models.length === 0) {
      throw new SessionError(`No models available for ${providerName}`);
    }
    modelName = await deps.prompter.chooseModel(providerName, models);
  }

  logger.info("Session selected", { provider: providerName, model: modelName });
  return { providerName, modelName, provider };
}
