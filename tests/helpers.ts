import type { OutputChannel } from "../src/ui/terminal.js";

export interface OutputLine {
  level: "info" | "success" | "warn" | "error" | "block";
  message: string;
}

export function recordingOutput(): { lines: OutputLine[]; channel: OutputChannel } {
  const lines: OutputLine[] = [];
  return {
    lines,
    channel: {
      info: (message) => lines.push({ level: "info", message }),
      success: (message) => lines.push({ level: "success", message }),
      warn: (message) => lines.push({ level: "warn", message }),
      error: (message) => lines.push({ level: "error", message }),
      block: (title, body) => lines.push({ level: "block", message: `${title}\n${body}` }),
    },
  };
}
