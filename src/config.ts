import { z } from "zod";
import { PROVIDER_NAMES, type ProviderName } from "./llm/types.js";

const optionalString = z
  .string()
  .trim()
  .transform((value) => value || undefined)
  .optional();

const envSchema = z.object({
  CODEREVIEW_PROVIDER: z.enum(PROVIDER_NAMES).optional(),
  CODEREVIEW_MODEL: optionalString,
  GOOGLE_API_KEY: optionalString,
  OPENAI_API_KEY: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  XAI_API_KEY: optionalString,
  OPENAI_BASE_URL: z.string().url().optional(),
  CODEREVIEW_OUTPUT_DIR: z.string().min(1).default("reviews"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("warn"),
});

export interface Config {
  defaults: {
    provider?: ProviderName;
    model?: string;
  };
  apiKeys: Partial<Record<ProviderName, string>>;
  openaiBaseURL?: string;
  outputDir: string;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid environment variables:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
  }
}

export function parseConfig(env: NodeJS.ProcessEnv): Config {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`
      )
    );
  }
  const data = result.data;
  return {
    defaults: {
      provider: data.CODEREVIEW_PROVIDER,
      model: data.CODEREVIEW_MODEL,
    },
    apiKeys: {
      Google: data.GOOGLE_API_KEY,
      OpenAI: data.OPENAI_API_KEY,
      Anthropic: data.ANTHROPIC_API_KEY,
      Grok: data.XAI_API_KEY,
    },
    openaiBaseURL: data.OPENAI_BASE_URL,
    outputDir: data.CODEREVIEW_OUTPUT_DIR,
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  try {
    return parseConfig(env);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    console.error("Invalid environment variables:");
    for (const issue of err.issues) {
      console.error(`  ${issue}`);
    }
    process.exit(1);
  }
}
