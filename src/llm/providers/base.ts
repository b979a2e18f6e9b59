import { logger, type Logger } from "../../logger.js";
import { createTerminal, type OutputChannel } from "../../ui/terminal.js";
import { GenerationError, ModelListError, errorMessage } from "../errors.js";
import type {
  Completion,
  LLMProvider,
  ProviderName,
  ReviewRequest,
} from "../types.js";

export const DEBUG_SENTINEL = "(Debug mode: AI call skipped)";

export interface ProviderOptions {
  output?: OutputChannel;
}

export function formatGenerationFailure(error: GenerationError): string {
  return `(Error during API call: ${error.message})`;
}

export function formatEmptyResponse(finishReason?: string): string {
  return `(AI returned an empty response; finish reason: ${finishReason ?? "unknown"})`;
}

/**
 * Shared half of every vendor adapter. Subclasses build their client in
 * `configure()` and only implement the raw vendor calls; the contracts that
 * `getModels` and `generateReview` never reject live here.
 */
export abstract class BaseProvider implements LLMProvider {
  abstract readonly name: ProviderName;

  protected readonly output: OutputChannel;

  constructor(
    protected readonly apiKey: string,
    options: ProviderOptions = {}
  ) {
    this.output = options.output ?? createTerminal();
  }

  abstract configure(): void;

  protected abstract listModels(): Promise<string[]>;

  /** Human-readable rendering of the request as the vendor would receive it. */
  protected abstract describeRequest(request: ReviewRequest): string;

  protected abstract complete(request: ReviewRequest): Promise<Completion>;

  protected get log(): Logger {
    return logger.withContext({ provider: this.name });
  }

  async getModels(): Promise<string[]> {
    try {
      return await this.listModels();
    } catch (err) {
      const error = new ModelListError(this.name, errorMessage(err), {
        cause: err,
      });
      this.output.error(error.message);
      this.log.warn("Model list unavailable", { error: error.message });
      return [];
    }
  }

  async generateReview(
    content: string,
    prompt: string,
    modelName: string,
    debugMode = false
  ): Promise<string> {
    const request: ReviewRequest = {
      provider: this.name,
      model: modelName,
      content,
      prompt,
    };

    if (debugMode) {
      this.output.block("DEBUG: Prompt for AI", this.describeRequest(request));
      return DEBUG_SENTINEL;
    }

    const startTime = Date.now();
    try {
      const completion = await this.complete(request);
      const durationMs = Date.now() - startTime;

      if (!completion.text) {
        this.output.warn(
          `${this.name} returned an empty response for ${modelName}`
        );
        this.log.warn("Empty response", {
          model: modelName,
          finishReason: completion.finishReason,
          durationMs,
        });
        return formatEmptyResponse(completion.finishReason);
      }

      this.log.info("Review generated", {
        model: modelName,
        durationMs,
        contentChars: content.length,
        responseChars: completion.text.length,
      });
      return completion.text;
    } catch (err) {
      const error = new GenerationError(this.name, modelName, errorMessage(err), {
        cause: err,
      });
      this.log.error("Review generation failed", {
        model: modelName,
        error: error.message,
      });
      return formatGenerationFailure(error);
    }
  }
}
