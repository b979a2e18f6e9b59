import Anthropic from "@anthropic-ai/sdk";
import type { Completion, ReviewRequest } from "../types.js";
import { buildUserMessage } from "../prompts.js";
import { ConfigurationError, errorMessage } from "../errors.js";
import { BaseProvider, type ProviderOptions } from "./base.js";

// Anthropic model discovery is not used; this list is what the picker offers.
export const ANTHROPIC_MODELS: readonly string[] = [
  "claude-sonnet-4-0",
  "claude-opus-4-0",
  "claude-3-7-sonnet-latest",
  "claude-3-5-sonnet-latest",
  "claude-3-5-haiku-latest",
  "claude-3-opus-latest",
];

export const ANTHROPIC_MAX_TOKENS = 4096;

export class AnthropicProvider extends BaseProvider {
  readonly name = "Anthropic";
  private client: Anthropic | null = null;

  constructor(apiKey: string, options: ProviderOptions = {}) {
    super(apiKey, options);
    this.configure();
  }

  configure(): void {
    if (!this.apiKey.trim()) {
      throw new ConfigurationError(this.name, "API key is empty");
    }
    try {
      this.client = new Anthropic({ apiKey: this.apiKey });
    } catch (err) {
      throw new ConfigurationError(this.name, errorMessage(err), { cause: err });
    }
  }

  private requireClient(): Anthropic {
    if (!this.client) {
      throw new ConfigurationError(this.name, "client is not configured");
    }
    return this.client;
  }

  protected async listModels(): Promise<string[]> {
    return [...ANTHROPIC_MODELS].sort();
  }

  protected describeRequest(request: ReviewRequest): string {
    return [
      `[system]\n${request.prompt}`,
      `[user]\n${buildUserMessage(request.content)}`,
    ].join("\n\n");
  }

  protected async complete(request: ReviewRequest): Promise<Completion> {
    const response = await this.requireClient().messages.create({
      model: request.model,
      max_tokens: ANTHROPIC_MAX_TOKENS,
      system: request.prompt,
      messages: [{ role: "user", content: buildUserMessage(request.content) }],
    });

    const text = response.content
      .map((block) => (block.type === "text" ? block.text : ""))
      .join("");
    return { text, finishReason: response.stop_reason ?? undefined };
  }
}
