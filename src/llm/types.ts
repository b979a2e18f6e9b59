export const PROVIDER_NAMES = ["Google", "OpenAI", "Anthropic", "Grok"] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

export interface ReviewRequest {
  provider: ProviderName;
  model: string;
  /** Diff text or concatenated file dumps. */
  content: string;
  prompt: string;
}

/** Text returned by a vendor call, with the vendor's stop reason when it gives one. */
export interface Completion {
  text: string;
  finishReason?: string;
}

export interface LLMProvider {
  readonly name: ProviderName;

  /** Builds the vendor client from the credential given at construction. */
  configure(): void;

  /** Resolves to `[]` when the vendor cannot be queried. */
  getModels(): Promise<string[]>;

  /** Always resolves to text: the review, the debug sentinel, or an embedded error. */
  generateReview(
    content: string,
    prompt: string,
    modelName: string,
    debugMode?: boolean
  ): Promise<string>;
}
