import { bold, dim, green, red, yellow } from "colorette";

/** Operator-facing output. Separate from the JSON logger, which writes to stderr. */
export interface OutputChannel {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  block(title: string, body: string): void;
}

export function createTerminal(
  out: NodeJS.WritableStream = process.stdout,
  err: NodeJS.WritableStream = process.stderr
): OutputChannel {
  return {
    info: (message) => out.write(`${message}\n`),
    success: (message) => out.write(`${green(message)}\n`),
    warn: (message) => err.write(`${yellow(message)}\n`),
    error: (message) => err.write(`${bold(red(message))}\n`),
    block: (title, body) => {
      out.write(`${dim(`--- ${title} ---`)}\n${body}\n${dim("--- END ---")}\n`);
    },
  };
}

export const silentOutput: OutputChannel = {
  info: () => {},
  success: () => {},
  warn: () => {},
  error: () => {},
  block: () => {},
};
