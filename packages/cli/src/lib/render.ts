/**
 * Output rendering helpers
 */

import { stableStringify } from "@qshape/sdk";

type Color = "red" | "green" | "yellow";

type Write = (content: string) => void;

/**
 * Print JSON with sorted keys
 * @param data - Data to serialize
 * @param write - Output sink
 * @param options - Rendering options
 */
export function printJson(data: unknown, write: Write, options?: { raw?: boolean }): void {
  write(stableStringify(data, options?.raw ? 0 : 2));
}

/**
 * Print lines (one per line)
 */
export function printLines(lines: string[], write: Write): void {
  for (const line of lines) {
    write(`${line}\n`);
  }
}

/**
 * Apply ANSI color only if output stream is a TTY
 */
export function colorize(
  text: string,
  color: Color,
  stream: NodeJS.WriteStream = process.stdout
): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}
