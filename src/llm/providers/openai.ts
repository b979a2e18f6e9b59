import OpenAI from "openai";
import type { Completion, ProviderName, ReviewRequest } from "../types.js";
import { buildUserMessage } from "../prompts.js";
import { ConfigurationError, errorMessage } from "../errors.js";
import { BaseProvider, type ProviderOptions } from "./base.js";

export const OPENAI_BASE_URL = "https://api.openai.com/v1";
export const GROK_BASE_URL = "https://api.x.ai/v1";

export interface OpenAIProviderOptions extends ProviderOptions {
  /** Any endpoint that speaks the OpenAI wire protocol. */
  baseURL?: string;
  /** Name reported for this instance; Grok reuses this adapter. */
  name?: ProviderName;
}

export class OpenAIProvider extends BaseProvider {
  readonly name: ProviderName;
  readonly baseURL: string;
  private client: OpenAI | null = null;

  constructor(apiKey: string, options: OpenAIProviderOptions = {}) {
    super(apiKey, options);
    this.name = options.name ?? "OpenAI";
    this.baseURL = options.baseURL ?? OPENAI_BASE_URL;
    this.configure();
  }

  configure(): void {
    if (!this.apiKey.trim()) {
      throw new ConfigurationError(this.name, "API key is empty");
    }
    try {
      this.client = new OpenAI({ apiKey: this.apiKey, baseURL: this.baseURL });
    } catch (err) {
      throw new ConfigurationError(this.name, errorMessage(err), { cause: err });
    }
  }

  private requireClient(): OpenAI {
    if (!this.client) {
      throw new ConfigurationError(this.name, "client is not configured");
    }
    return this.client;
  }

  protected async listModels(): Promise<string[]> {
    const ids: string[] = [];
    for await (const model of this.requireClient().models.list()) {
      ids.push(model.id);
    }
    return ids.sort();
  }

  protected describeRequest(request: ReviewRequest): string {
    return [
      `[system]\n${request.prompt}`,
      `[user]\n${buildUserMessage(request.content)}`,
    ].join("\n\n");
  }

  protected async complete(request: ReviewRequest): Promise<Completion> {
    const response = await this.requireClient().chat.completions.create({
      model: request.model,
      messages: [
        { role: "system", content: request.prompt },
        { role: "user", content: buildUserMessage(request.content) },
      ],
    });

    const choice = response.choices[0];
    return {
      text: choice?.message?.content ?? "",
      finishReason: choice?.finish_reason,
    };
  }
}
