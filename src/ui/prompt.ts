import { createInterface, type Interface } from "node:readline/promises";
import { Writable } from "node:stream";
import { bold, dim } from "colorette";
import type { ProviderName } from "../llm/types.js";
import type { SessionPrompter } from "../session.js";

export function parseChoice(answer: string, count: number): number | null {
  const index = Number.parseInt(answer.trim(), 10);
  if (!Number.isInteger(index) || index < 1 || index > count) return null;
  return index - 1;
}

export function parseYesNo(answer: string, fallback: boolean): boolean {
  const value = answer.trim().toLowerCase();
  if (!value) return fallback;
  return value === "y" || value === "yes";
}

/** readline-backed prompts; one interface is kept open until `close()`. */
export class TerminalPrompter implements SessionPrompter {
  private rl: Interface | null = null;
  private muted = false;
  private readonly echo = new Writable({
    write: (chunk, _encoding, callback) => {
      if (!this.muted) this.output.write(chunk);
      callback();
    },
  });

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  private getInterface(): Interface {
    if (!this.rl) {
      this.rl = createInterface({
        input: this.input,
        output: this.echo,
        terminal: "isTTY" in this.output && this.output.isTTY === true,
      });
    }
    return this.rl;
  }

  close(): void {
    this.rl?.close();
    this.rl = null;
  }

  async ask(question: string): Promise<string> {
    return this.getInterface().question(`${question} `);
  }

  /** Like `ask`, but nothing typed is echoed. */
  async askSecret(question: string): Promise<string> {
    const answer = this.getInterface().question(`${question} `);
    this.muted = true;
    try {
      return await answer;
    } finally {
      this.muted = false;
      this.output.write("\n");
    }
  }

  async confirm(question: string, fallback = true): Promise<boolean> {
    const hint = fallback ? "[Y/n]" : "[y/N]";
    return parseYesNo(await this.ask(`${question} ${dim(hint)}`), fallback);
  }

  async select<T extends string>(
    title: string,
    choices: readonly T[]
  ): Promise<T> {
    if (choices.length === 0) {
      throw new Error(`${title}: nothing to choose from`);
    }
    this.output.write(`${bold(title)}\n`);
    choices.forEach((choice, i) => {
      this.output.write(`  ${dim(`${i + 1})`)} ${choice}\n`);
    });

    for (;;) {
      const answer = await this.ask(`Choose 1-${choices.length}:`);
      const index = parseChoice(answer, choices.length);
      if (index !== null) return choices[index];
      this.output.write("Please enter one of the listed numbers.\n");
    }
  }

  confirmDefaults(provider: ProviderName, model?: string): Promise<boolean> {
    const target = model ? `${provider} / ${model}` : provider;
    return this.confirm(`Use default ${target}?`);
  }

  chooseProvider(choices: readonly ProviderName[]): Promise<ProviderName> {
    return this.select("Select a provider", choices);
  }

  chooseModel(provider: ProviderName, models: string[]): Promise<string> {
    return this.select(`Select a ${provider} model`, models);
  }

  askApiKey(provider: ProviderName): Promise<string> {
    return this.askSecret(`Enter your ${provider} API key:`);
  }

  confirmSaveApiKey(provider: ProviderName, envKey: string): Promise<boolean> {
    return this.confirm(
      `Save the ${provider} key to .env as ${envKey}?`,
      false
    );
  }
}
