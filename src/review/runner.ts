import type { LLMProvider } from "../llm/types.js";
import { logger } from "../logger.js";

export interface ReviewItem {
  /** Shown as the section title in the report, e.g. a commit subject. */
  label: string;
  content: string;
}

export interface ReviewOutcome {
  label: string;
  text: string;
  durationMs: number;
}

export interface RunReviewsOptions {
  prompt: string;
  modelName: string;
  debugMode?: boolean;
  /**
   * Asked before every item after the first. Returning false ends the batch;
   * the remaining items are left out of the result.
   */
  shouldContinue?: (next: ReviewItem, index: number) => Promise<boolean>;
  onOutcome?: (outcome: ReviewOutcome, index: number) => void;
}

/**
 * Reviews `items` one after another, in order. A failed generation is an
 * outcome like any other because adapters embed failures in the text.
 */
export async function runReviews(
  provider: LLMProvider,
  items: ReviewItem[],
  options: RunReviewsOptions
): Promise<ReviewOutcome[]> {
  const outcomes: ReviewOutcome[] = [];
  const log = logger.withContext({
    provider: provider.name,
    model: options.modelName,
  });

  for (const [index, item] of items.entries()) {
    if (index > 0 && options.shouldContinue) {
      const proceed = await options.shouldContinue(item, index);
      if (!proceed) {
        log.info("Batch stopped by operator", {
          completed: outcomes.length,
          remaining: items.length - index,
        });
        break;
      }
    }

    const startTime = Date.now();
    const text = await provider.generateReview(
      item.content,
      options.prompt,
      options.modelName,
      options.debugMode ?? false
    );
    const outcome = { label: item.label, text, durationMs: Date.now() - startTime };
    outcomes.push(outcome);
    options.onOutcome?.(outcome, index);
    log.debug("Review item finished", {
      target: item.label,
      durationMs: outcome.durationMs,
    });
  }

  return outcomes;
}
