import { chmod, readFile, writeFile } from "node:fs/promises";
import { parse } from "dotenv";

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function readEnvFile(path: string): Promise<string> {
  try {
    return await readFile(path, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) return "";
    throw err;
  }
}

// dotenv reads quoted values literally, except `\n` and `\r` in double quotes.
function formatValue(value: string): string {
  if (/^[\w.\-/:@]*$/.test(value)) return value;
  const quote = ["'", "`", '"'].find(
    (q) => !value.includes(q) && (q !== '"' || !/\\[nr]/.test(value))
  );
  if (quote === undefined) {
    throw new Error("Value cannot be quoted for an env file");
  }
  return `${quote}${value}${quote}`;
}

export async function readEnvEntries(
  path: string
): Promise<Record<string, string>> {
  return parse(await readEnvFile(path));
}

/**
 * Writes `entries` into the env file at `path`, replacing the first
 * assignment of each key in place, dropping repeated ones and appending the
 * rest. Other lines are kept as they are. The file ends up mode 0600.
 */
export async function saveEnvEntries(
  path: string,
  entries: Record<string, string>
): Promise<void> {
  const values = new Map(Object.entries(entries));
  const written = new Set<string>();
  const lines = (await readEnvFile(path)).split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();

  const updated = lines.flatMap((line) => {
    const match = /^\s*(?:export\s+)?([\w.-]+)\s*=/.exec(line);
    const key = match?.[1];
    if (key === undefined) return [line];
    const value = values.get(key);
    if (value === undefined) return [line];
    if (written.has(key)) return [];
    written.add(key);
    return [`${key}=${formatValue(value)}`];
  });

  for (const [key, value] of values) {
    if (!written.has(key)) updated.push(`${key}=${formatValue(value)}`);
  }

  await writeFile(path, `${updated.join("\n")}\n`, { mode: 0o600 });
  await chmod(path, 0o600);
}
