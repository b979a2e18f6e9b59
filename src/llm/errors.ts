import type { ProviderName } from "./types.js";

export class ProviderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The credential was blank or the vendor SDK refused to build a client with it. */
export class ConfigurationError extends ProviderError {
  constructor(
    readonly provider: ProviderName,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to configure ${provider} API: ${detail}`, options);
  }
}

export class ModelListError extends ProviderError {
  constructor(
    readonly provider: ProviderName,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(`Could not fetch ${provider} model list: ${detail}`, options);
  }
}

export class GenerationError extends ProviderError {
  constructor(
    readonly provider: ProviderName,
    readonly model: string,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(detail, options);
  }
}

export class UnknownProviderError extends ProviderError {
  constructor(readonly providerName: string) {
    super(`Unsupported provider: ${providerName}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
