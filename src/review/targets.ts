import {
  diffRange,
  getCurrentBranch,
  listCommits,
  showCommit,
} from "../git.js";
import { filterDiff } from "./differ.js";
import { collectFiles, concatenateFiles } from "./files.js";
import type { ReviewItem } from "./runner.js";

export interface ReviewTarget {
  /** Used in the report title and file name. */
  title: string;
  items: ReviewItem[];
}

export async function branchTarget(
  cwd: string,
  base: string,
  head: string | undefined,
  ignorePaths: string[]
): Promise<ReviewTarget> {
  const headRef = head ?? (await getCurrentBranch(cwd)) ?? "HEAD";
  const diff = filterDiff(await diffRange(cwd, base, headRef), ignorePaths);
  const title = `${base}...${headRef}`;
  return { title, items: diff ? [{ label: title, content: diff }] : [] };
}

/** One item per commit, oldest first; commits left empty by the ignore list are dropped. */
export async function commitsTarget(
  cwd: string,
  range: string,
  ignorePaths: string[]
): Promise<ReviewTarget> {
  const items: ReviewItem[] = [];
  for (const commit of await listCommits(cwd, range)) {
    const diff = filterDiff(await showCommit(cwd, commit.sha), ignorePaths);
    if (!diff) continue;
    items.push({
      label: `${commit.sha.slice(0, 7)} ${commit.subject}`,
      content: diff,
    });
  }
  return { title: range, items };
}

export async function filesTarget(
  root: string,
  paths: string[],
  ignorePaths: string[]
): Promise<ReviewTarget> {
  const relPaths = await collectFiles(root, paths, ignorePaths);
  const content = await concatenateFiles(root, relPaths);
  const title = paths.length === 1 ? paths[0] : `${relPaths.length} files`;
  return { title, items: content ? [{ label: title, content }] : [] };
}
