import { minimatch } from "minimatch";

export interface FileDiff {
  path: string;
  /** The whole per-file section, starting at its `diff --git` line. */
  patch: string;
}

function isBinarySection(section: string): boolean {
  return (
    /^Binary files (.* )?differ$/m.test(section) ||
    section.includes("GIT binary patch")
  );
}

export function parseDiff(rawDiff: string): FileDiff[] {
  const files: FileDiff[] = [];
  const fileSections = rawDiff.split(/^diff --git /m).filter(Boolean);

  for (const section of fileSections) {
    const pathMatch = section.match(/^a\/(.+?)\s+b\/(.+)/m);
    if (!pathMatch) continue;

    const path = pathMatch[2];

    if (isBinarySection(section)) continue;

    if (!section.includes("@@")) continue;

    files.push({ path, patch: `diff --git ${section.replace(/\n+$/, "")}` });
  }

  return files;
}

export function filterFiles(
  files: FileDiff[],
  ignorePaths: string[]
): FileDiff[] {
  return files.filter((file) => {
    return !ignorePaths.some((pattern) =>
      minimatch(file.path, pattern, { dot: true })
    );
  });
}

export function renderDiff(files: FileDiff[]): string {
  return files.map((file) => file.patch).join("\n");
}

/** Drops binary and ignored files from a unified diff. */
export function filterDiff(rawDiff: string, ignorePaths: string[]): string {
  return renderDiff(filterFiles(parseDiff(rawDiff), ignorePaths));
}
