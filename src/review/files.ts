import { readFile, readdir, stat } from "node:fs/promises";
import { join, relative, resolve, sep } from "node:path";
import { minimatch } from "minimatch";

const ALWAYS_SKIPPED_DIRS = new Set([".git", "node_modules"]);

function toPosix(path: string): string {
  return path.split(sep).join("/");
}

function isIgnored(relPath: string, ignorePaths: string[]): boolean {
  return ignorePaths.some((pattern) =>
    minimatch(relPath, pattern, { dot: true })
  );
}

async function walk(
  root: string,
  dir: string,
  ignorePaths: string[],
  found: string[]
): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const absolute = join(dir, entry.name);
    const relPath = toPosix(relative(root, absolute));
    if (entry.isDirectory()) {
      if (ALWAYS_SKIPPED_DIRS.has(entry.name)) continue;
      await walk(root, absolute, ignorePaths, found);
    } else if (entry.isFile() && !isIgnored(relPath, ignorePaths)) {
      found.push(relPath);
    }
  }
}

/**
 * Expands `paths` (files or directories, relative to `root`) into a sorted,
 * de-duplicated list of root-relative file paths.
 */
export async function collectFiles(
  root: string,
  paths: string[],
  ignorePaths: string[] = []
): Promise<string[]> {
  const found: string[] = [];
  for (const path of paths) {
    const absolute = resolve(root, path);
    const info = await stat(absolute);
    if (info.isDirectory()) {
      await walk(root, absolute, ignorePaths, found);
    } else {
      const relPath = toPosix(relative(root, absolute));
      if (!isIgnored(relPath, ignorePaths)) found.push(relPath);
    }
  }
  return Array.from(new Set(found)).sort();
}

export function fileHeader(relPath: string): string {
  return `--- File: ${relPath} ---`;
}

/** Binary files (anything with a NUL byte) are left out. */
export async function concatenateFiles(
  root: string,
  relPaths: string[]
): Promise<string> {
  const blocks: string[] = [];
  for (const relPath of relPaths) {
    const data = await readFile(join(root, relPath));
    if (data.includes(0)) continue;
    blocks.push(`${fileHeader(relPath)}\n${data.toString("utf-8")}`);
  }
  return blocks.join("\n\n");
}
