import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { ProviderName } from "./llm/types.js";
import type { ReviewOutcome } from "./review/runner.js";

export interface ReportMeta {
  target: string;
  provider: ProviderName;
  model: string;
  createdAt: Date;
  debugMode: boolean;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function slugify(value: string): string {
  const slug = value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 60)
    .replace(/-+$/, "");
  return slug || "review";
}

export function reportFileName(target: string, date: Date): string {
  return `review_${slugify(target)}_${formatTimestamp(date)}.md`;
}

export function renderReport(meta: ReportMeta, outcomes: ReviewOutcome[]): string {
  const lines = [
    `# Code Review: ${meta.target}`,
    "",
    `- Provider: ${meta.provider}`,
    `- Model: ${meta.model}`,
    `- Date: ${meta.createdAt.toISOString()}`,
  ];
  if (meta.debugMode) {
    lines.push("- Debug mode: AI calls skipped");
  }

  for (const outcome of outcomes) {
    lines.push("", `## ${outcome.label}`, "", outcome.text.trim());
  }

  return `${lines.join("\n")}\n`;
}

/** Resolves to the path of the written report. */
export async function writeReport(
  dir: string,
  meta: ReportMeta,
  outcomes: ReviewOutcome[]
): Promise<string> {
  await mkdir(dir, { recursive: true });
  const path = join(dir, reportFileName(meta.target, meta.createdAt));
  await writeFile(path, renderReport(meta, outcomes), "utf-8");
  return path;
}
