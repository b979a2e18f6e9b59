import { GoogleGenerativeAI } from "@google/generative-ai";
import { z } from "zod";
import type { Completion, ReviewRequest } from "../types.js";
import { buildCombinedPrompt } from "../prompts.js";
import { ConfigurationError, errorMessage } from "../errors.js";
import { BaseProvider, type ProviderOptions } from "./base.js";

export const GEMINI_API_BASE = "https://generativelanguage.googleapis.com/v1beta";

const modelListSchema = z.object({
  models: z
    .array(
      z.object({
        name: z.string(),
        supportedGenerationMethods: z.array(z.string()).default([]),
      })
    )
    .default([]),
  nextPageToken: z.string().optional(),
});

/**
 * Orders model names so that the higher tiers come first in the picker:
 * every "pro" model, then every "flash" model, then the rest, each group
 * sorted lexicographically.
 */
export function orderByTier(models: readonly string[]): string[] {
  const pro = models.filter((m) => m.includes("pro")).sort();
  const flash = models
    .filter((m) => !m.includes("pro") && m.includes("flash"))
    .sort();
  const other = models
    .filter((m) => !m.includes("pro") && !m.includes("flash"))
    .sort();
  return [...pro, ...flash, ...other];
}

export function stripModelPrefix(name: string): string {
  return name.replace(/^models\//, "");
}

export class GeminiProvider extends BaseProvider {
  readonly name = "Google";
  private client: GoogleGenerativeAI | null = null;

  constructor(apiKey: string, options: ProviderOptions = {}) {
    super(apiKey, options);
    this.configure();
  }

  configure(): void {
    if (!this.apiKey.trim()) {
      throw new ConfigurationError(this.name, "API key is empty");
    }
    try {
      this.client = new GoogleGenerativeAI(this.apiKey);
    } catch (err) {
      throw new ConfigurationError(this.name, errorMessage(err), { cause: err });
    }
  }

  private requireClient(): GoogleGenerativeAI {
    if (!this.client) {
      throw new ConfigurationError(this.name, "client is not configured");
    }
    return this.client;
  }

  // The SDK has no model listing, so this goes to the REST endpoint directly.
  protected async listModels(): Promise<string[]> {
    const names: string[] = [];
    let pageToken: string | undefined;

    do {
      const url = new URL(`${GEMINI_API_BASE}/models`);
      url.searchParams.set("pageSize", "1000");
      if (pageToken) url.searchParams.set("pageToken", pageToken);

      const response = await fetch(url, {
        headers: { "x-goog-api-key": this.apiKey },
      });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status} ${response.statusText}`);
      }

      const page = modelListSchema.parse(await response.json());
      for (const model of page.models) {
        if (model.supportedGenerationMethods.includes("generateContent")) {
          names.push(stripModelPrefix(model.name));
        }
      }
      pageToken = page.nextPageToken || undefined;
    } while (pageToken);

    return orderByTier(names);
  }

  protected describeRequest(request: ReviewRequest): string {
    return buildCombinedPrompt(request.prompt, request.content);
  }

  protected async complete(request: ReviewRequest): Promise<Completion> {
    const model = this.requireClient().getGenerativeModel({
      model: request.model,
    });
    const result = await model.generateContent(
      buildCombinedPrompt(request.prompt, request.content)
    );

    const response = result.response;
    const candidate = response.candidates?.[0];
    if (!candidate?.content?.parts?.length) {
      return {
        text: "",
        finishReason:
          candidate?.finishReason ?? response.promptFeedback?.blockReason,
      };
    }
    return { text: response.text(), finishReason: candidate.finishReason };
  }
}
