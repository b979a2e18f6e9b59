import { describe, test, expect, vi } from "vitest";

const sdk = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock("openai", () => ({
  default: class {
    chat = { completions: { create: sdk.create } };
  },
}));

import { runReviews, type ReviewItem } from "../src/review/runner.js";
import { OpenAIProvider } from "../src/llm/providers/openai.js";
import { buildUserMessage } from "../src/llm/prompts.js";
import type { LLMProvider } from "../src/llm/types.js";
import { silentOutput } from "../src/ui/terminal.js";

function completion(content: string) {
  return { choices: [{ message: { content }, finish_reason: "stop" }] };
}

const ITEMS: ReviewItem[] = [
  { label: "aaa1111 First", content: "diff one" },
  { label: "bbb2222 Second", content: "diff two" },
  { label: "ccc3333 Third", content: "diff three" },
];

function echoProvider(): LLMProvider & { calls: string[] } {
  const calls: string[] = [];
  return {
    name: "OpenAI",
    calls,
    configure: () => {},
    getModels: async () => ["echo-1"],
    generateReview: async (content) => {
      calls.push(content);
      return `reviewed ${content}`;
    },
  };
}

describe("runReviews", () => {
  test("a failing item becomes an embedded error between successful ones", async () => {
    sdk.create
      .mockResolvedValueOnce(completion("Review one"))
      .mockRejectedValueOnce(new Error("socket hang up"))
      .mockResolvedValueOnce(completion("Review three"));
    const provider = new OpenAIProvider("test-key", { output: silentOutput });

    const outcomes = await runReviews(provider, ITEMS, {
      prompt: "Review",
      modelName: "gpt-4o",
    });

    expect(outcomes.map((o) => [o.label, o.text])).toEqual([
      ["aaa1111 First", "Review one"],
      ["bbb2222 Second", "(Error during API call: socket hang up)"],
      ["ccc3333 Third", "Review three"],
    ]);
    expect(
      sdk.create.mock.calls.map((call) => call[0].messages[1].content)
    ).toEqual(ITEMS.map((item) => buildUserMessage(item.content)));
  });

  test("processes items in the order given", async () => {
    const provider = echoProvider();
    const outcomes = await runReviews(provider, ITEMS, { prompt: "p", modelName: "echo-1" });

    expect(provider.calls).toEqual(["diff one", "diff two", "diff three"]);
    expect(outcomes.map((o) => o.text)).toEqual([
      "reviewed diff one",
      "reviewed diff two",
      "reviewed diff three",
    ]);
  });

  test("asks between items only and stops when declined", async () => {
    const provider = echoProvider();
    const shouldContinue = vi.fn(async (_next: ReviewItem, index: number) => index < 2);

    const outcomes = await runReviews(provider, ITEMS, {
      prompt: "p",
      modelName: "echo-1",
      shouldContinue,
    });

    expect(outcomes.map((o) => o.label)).toEqual(["aaa1111 First", "bbb2222 Second"]);
    expect(shouldContinue.mock.calls).toEqual([
      [ITEMS[1], 1],
      [ITEMS[2], 2],
    ]);
    expect(provider.calls).toEqual(["diff one", "diff two"]);
  });

  test("passes the debug flag through", async () => {
    const provider = new OpenAIProvider("test-key", { output: silentOutput });
    const onOutcome = vi.fn();

    const outcomes = await runReviews(provider, ITEMS.slice(0, 2), {
      prompt: "p",
      modelName: "gpt-4o",
      debugMode: true,
      onOutcome,
    });

    expect(outcomes.map((o) => o.text)).toEqual([
      "(Debug mode: AI call skipped)",
      "(Debug mode: AI call skipped)",
    ]);
    expect(sdk.create).not.toHaveBeenCalled();
    expect(onOutcome).toHaveBeenCalledTimes(2);
  });

  test("returns nothing for an empty batch", async () => {
    expect(await runReviews(echoProvider(), [], { prompt: "p", modelName: "m" })).toEqual([]);
  });
});
