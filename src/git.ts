import { execa } from "execa";

export interface CommitSummary {
  sha: string;
  subject: string;
}

export class GitError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GitError";
  }
}

/** Refuses anything git could read as an option. */
export function isSafeRef(ref: string): boolean {
  if (!ref || ref.length > 200) return false;
  return !ref.startsWith("-") && !/\s|\0/.test(ref);
}

function assertSafeRef(ref: string): void {
  if (!isSafeRef(ref)) {
    throw new GitError(`Invalid git ref: ${JSON.stringify(ref)}`);
  }
}

async function runGit(cwd: string, args: string[]): Promise<string> {
  try {
    const { stdout } = await execa("git", args, { cwd });
    return stdout;
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new GitError(`git ${args[0]} failed: ${detail}`, { cause: err });
  }
}

export async function isGitRepository(cwd: string): Promise<boolean> {
  try {
    const stdout = await runGit(cwd, ["rev-parse", "--is-inside-work-tree"]);
    return stdout.trim() === "true";
  } catch {
    return false;
  }
}

export async function getRepoRoot(cwd: string): Promise<string> {
  return (await runGit(cwd, ["rev-parse", "--show-toplevel"])).trim();
}

/** Resolves to null on a detached HEAD. */
export async function getCurrentBranch(cwd: string): Promise<string | null> {
  const branch = (await runGit(cwd, ["branch", "--show-current"])).trim();
  return branch || null;
}

// Drops symbolic remote heads and the detached-HEAD placeholder.
function isBranchName(value: string): boolean {
  return (
    value.length > 0 &&
    value !== "HEAD" &&
    !value.endsWith("/HEAD") &&
    !value.startsWith("(")
  );
}

export async function listBranches(cwd: string): Promise<string[]> {
  const stdout = await runGit(cwd, [
    "branch",
    "-a",
    "--format=%(refname:short)",
  ]);
  return stdout
    .split("\n")
    .map((value) => value.trim())
    .filter(isBranchName);
}

export function parseCommitLog(stdout: string): CommitSummary[] {
  return stdout
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean)
    .map((line) => {
      const [sha, ...subject] = line.split("\t");
      return { sha, subject: subject.join("\t") };
    });
}

/** Commits in `range` (e.g. `main..feature`), oldest first. */
export async function listCommits(
  cwd: string,
  range: string
): Promise<CommitSummary[]> {
  assertSafeRef(range);
  const stdout = await runGit(cwd, [
    "log",
    "--reverse",
    "--no-decorate",
    "--format=%H%x09%s",
    range,
    "--",
  ]);
  return parseCommitLog(stdout);
}

/** Changes on `head` since it diverged from `base`. */
export async function diffRange(
  cwd: string,
  base: string,
  head: string
): Promise<string> {
  assertSafeRef(base);
  assertSafeRef(head);
  return runGit(cwd, ["diff", `${base}...${head}`, "--"]);
}

export async function showCommit(cwd: string, sha: string): Promise<string> {
  assertSafeRef(sha);
  return runGit(cwd, ["show", "--format=", "--patch", sha, "--"]);
}

export async function fetchRemote(
  cwd: string,
  remote = "origin"
): Promise<void> {
  assertSafeRef(remote);
  await runGit(cwd, ["fetch", "--prune", remote]);
}

export async function pullCurrent(cwd: string): Promise<void> {
  await runGit(cwd, ["pull", "--ff-only"]);
}
