#!/usr/bin/env node
import { resolve } from "node:path";
import { Command, InvalidArgumentError } from "commander";
import { bold } from "colorette";
import { config as loadEnv } from "dotenv";

import { loadConfig, type Config } from "./config.js";
import { saveEnvEntries } from "./env-store.js";
import {
  fetchRemote,
  isGitRepository,
  listBranches,
  pullCurrent,
} from "./git.js";
import { isProviderName, listProviders } from "./llm/registry.js";
import type { ProviderName } from "./llm/types.js";
import { logger } from "./logger.js";
import {
  loadProjectConfig,
  mergeSettings,
  type ReviewSettings,
} from "./project-config.js";
import { writeReport } from "./report.js";
import {
  branchTarget,
  commitsTarget,
  filesTarget,
  type ReviewTarget,
} from "./review/targets.js";
import { runReviews } from "./review/runner.js";
import {
  resolveProvider,
  resolveSession,
  type CredentialStore,
} from "./session.js";
import { TerminalPrompter } from "./ui/prompt.js";
import { createTerminal } from "./ui/terminal.js";

type GlobalOptions = {
  provider?: ProviderName;
  model?: string;
  useDefaults?: boolean;
  debug?: boolean;
  cwd: string;
  envFile: string;
  saveDefaults?: boolean;
};

interface BranchOptions {
  head?: string;
  fetch?: boolean;
  pull?: boolean;
}

interface RunContext {
  options: GlobalOptions;
  cwd: string;
  envPath: string;
  config: Config;
  settings: ReviewSettings;
  store: CredentialStore;
}

const output = createTerminal();
const prompter = new TerminalPrompter();

function parseProvider(value: string): ProviderName {
  if (!isProviderName(value)) {
    throw new InvalidArgumentError(
      `Expected one of: ${listProviders().join(", ")}`
    );
  }
  return value;
}

const program = new Command()
  .name("reviewdesk")
  .description(
    `${bold("reviewdesk")}: review branches, commits or files with an LLM`
  )
  .version("0.1.0")
  .option(
    "-p, --provider <name>",
    `LLM provider (${listProviders().join(", ")})`,
    parseProvider
  )
  .option("-m, --model <name>", "model name for the provider")
  .option(
    "-y, --use-defaults",
    "use the stored default provider and model without asking"
  )
  .option("--debug", "print the requests instead of calling the provider")
  .option("-C, --cwd <dir>", "project directory", process.cwd())
  .option("--env-file <path>", "env file with defaults and API keys", ".env")
  .option("--save-defaults", "store the chosen provider and model as defaults");

program.showHelpAfterError();

async function createContext(): Promise<RunContext> {
  const options = program.opts<GlobalOptions>();
  const cwd = resolve(options.cwd);
  const envPath = resolve(cwd, options.envFile);
  loadEnv({ path: envPath });

  const config = loadConfig();
  const projectConfig = await loadProjectConfig(cwd);
  return {
    options,
    cwd,
    envPath,
    config,
    settings: mergeSettings({ outputDir: config.outputDir }, projectConfig),
    store: { save: (entries) => saveEnvEntries(envPath, entries) },
  };
}

async function requireGitRepository(cwd: string): Promise<void> {
  if (!(await isGitRepository(cwd))) {
    throw new Error(`${cwd} is not inside a git repository`);
  }
}

async function review(
  ctx: RunContext,
  target: ReviewTarget,
  step = false
): Promise<void> {
  if (target.items.length === 0) {
    output.warn(`Nothing to review for ${target.title}`);
    return;
  }

  const { options, config, settings } = ctx;
  const session = await resolveSession(
    config,
    {
      provider: options.provider,
      model: options.model,
      useDefaults: options.useDefaults,
    },
    { prompter, store: ctx.store, providerOptions: { output } }
  );

  if (options.saveDefaults) {
    await ctx.store.save({
      CODEREVIEW_PROVIDER: session.providerName,
      CODEREVIEW_MODEL: session.modelName,
    });
    output.info(
      `Saved ${session.providerName} / ${session.modelName} as defaults`
    );
  }

  const debugMode = options.debug ?? false;
  const outcomes = await runReviews(session.provider, target.items, {
    prompt: settings.prompt,
    modelName: session.modelName,
    debugMode,
    shouldContinue: step
      ? (next) => prompter.confirm(`Continue with ${next.label}?`)
      : undefined,
    onOutcome: (outcome, index) =>
      output.info(
        `[${index + 1}/${target.items.length}] ${outcome.label}` +
          ` (${outcome.durationMs}ms)`
      ),
  });

  const reportPath = await writeReport(
    resolve(ctx.cwd, settings.outputDir),
    {
      target: target.title,
      provider: session.providerName,
      model: session.modelName,
      createdAt: new Date(),
      debugMode,
    },
    outcomes
  );
  output.success(`Report saved to ${reportPath}`);
}

program
  .command("branch")
  .description("review a branch's changes since it left a base branch")
  .argument("[base]", "base branch; chosen interactively when omitted")
  .option("--head <ref>", "branch or commit to review (default: current)")
  .option("--fetch", "fetch from origin first")
  .option("--pull", "fast-forward the current branch first")
  .action(async (base: string | undefined, opts: BranchOptions) => {
    const ctx = await createContext();
    await requireGitRepository(ctx.cwd);
    if (opts.fetch) await fetchRemote(ctx.cwd);
    if (opts.pull) await pullCurrent(ctx.cwd);

    const baseRef =
      base ??
      (await prompter.select(
        "Select the base branch",
        await listBranches(ctx.cwd)
      ));
    const target = await branchTarget(
      ctx.cwd,
      baseRef,
      opts.head,
      ctx.settings.ignorePaths
    );
    await review(ctx, target);
  });

program
  .command("commits")
  .description("review each commit in a range separately, oldest first")
  .argument("<range>", "commit range, e.g. main..feature")
  .option("--step", "ask before reviewing each next commit")
  .action(async (range: string, opts: { step?: boolean }) => {
    const ctx = await createContext();
    await requireGitRepository(ctx.cwd);
    const target = await commitsTarget(
      ctx.cwd,
      range,
      ctx.settings.ignorePaths
    );
    await review(ctx, target, opts.step ?? false);
  });

program
  .command("files")
  .description("review files and directories as they are")
  .argument("<paths...>", "files or directories, relative to the project")
  .action(async (paths: string[]) => {
    const ctx = await createContext();
    const target = await filesTarget(ctx.cwd, paths, ctx.settings.ignorePaths);
    await review(ctx, target);
  });

program
  .command("models")
  .description("list the models a provider offers")
  .action(async () => {
    const ctx = await createContext();
    const session = await resolveProvider(
      ctx.config,
      { provider: ctx.options.provider, useDefaults: true },
      { prompter, store: ctx.store, providerOptions: { output } }
    );
    const models = await session.provider.getModels();
    if (models.length === 0) {
      output.warn(`No models available for ${session.providerName}`);
      return;
    }
    for (const model of models) output.info(model);
  });

program
  .command("defaults")
  .description("show or store the default provider and model")
  .action(async () => {
    const ctx = await createContext();
    const { provider, model } = ctx.options;
    if (!provider && !model) {
      const current = ctx.config.defaults;
      output.info(`Provider: ${current.provider ?? "(not set)"}`);
      output.info(`Model: ${current.model ?? "(not set)"}`);
      return;
    }
    const entries: Record<string, string> = {};
    if (provider) entries.CODEREVIEW_PROVIDER = provider;
    if (model) entries.CODEREVIEW_MODEL = model;
    await ctx.store.save(entries);
    output.success(`Defaults saved to ${ctx.envPath}`);
  });

program
  .parseAsync()
  .catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    logger.error("Command failed", { error: message });
    output.error(message);
    process.exitCode = 1;
  })
  .finally(() => prompter.close());
