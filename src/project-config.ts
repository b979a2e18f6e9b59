import { readFile } from "node:fs/promises";
import { join } from "node:path";
import YAML from "yaml";
import { z } from "zod";
import { DEFAULT_REVIEW_PROMPT, joinPromptFragments } from "./llm/prompts.js";
import { logger } from "./logger.js";

export const PROJECT_CONFIG_FILE = ".codereview.yml";

const projectConfigSchema = z.object({
  prompts: z.array(z.string()).optional(),
  ignorePaths: z.array(z.string()).optional(),
  outputDir: z.string().min(1).optional(),
});

export type ProjectConfig = z.infer<typeof projectConfigSchema>;

export interface ReviewSettings {
  prompt: string;
  ignorePaths: string[];
  outputDir: string;
}

export const DEFAULT_IGNORE_PATHS = [
  "**/package-lock.json",
  "**/*.lock",
  "**/*.min.js",
  "**/dist/**",
];

/** Resolves to null when the file is absent or not a valid config. */
export async function loadProjectConfig(
  root: string
): Promise<ProjectConfig | null> {
  let content: string;
  try {
    content = await readFile(join(root, PROJECT_CONFIG_FILE), "utf-8");
  } catch {
    return null;
  }

  try {
    const result = projectConfigSchema.safeParse(YAML.parse(content) ?? {});
    if (!result.success) {
      logger.warn(`Ignoring invalid ${PROJECT_CONFIG_FILE}`, {
        root,
        issues: result.error.issues.map(
          (issue) => `${issue.path.join(".")}: ${issue.message}`
        ),
      });
      return null;
    }
    return result.data;
  } catch (err) {
    logger.warn(`Failed to parse ${PROJECT_CONFIG_FILE}`, {
      root,
      error: String(err),
    });
    return null;
  }
}

export function mergeSettings(
  defaults: { outputDir: string },
  projectConfig: ProjectConfig | null
): ReviewSettings {
  const prompt = joinPromptFragments(projectConfig?.prompts ?? []);
  return {
    prompt: prompt || DEFAULT_REVIEW_PROMPT,
    ignorePaths: projectConfig?.ignorePaths ?? DEFAULT_IGNORE_PATHS,
    outputDir: projectConfig?.outputDir ?? defaults.outputDir,
  };
}
