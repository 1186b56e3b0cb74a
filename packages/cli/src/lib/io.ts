/**
 * I/O helpers for CLI
 */

import * as fs from "node:fs/promises";
import { InvalidArgumentError } from "commander";
import { EXIT_CODE } from "@qshape/sdk";
import { parseJson } from "./arg.js";
import { CliError } from "./errors.js";

/**
 * Streams the CLI talks to; tests substitute in-memory versions
 */
export interface CliIO {
  stdout(content: string): void;
  stderr(content: string): void;
  readStdin(): Promise<string>;
  isStdinTTY(): boolean;
}

/**
 * Read from stdin with size limit (default 10MB)
 * @param maxBytes - Maximum bytes to read (default 10MB)
 * @param stream - Source stream; defaults to process.stdin
 * @throws CliError with the invalid-arguments exit code if input exceeds the limit
 */
export async function readStdin(
  maxBytes = 10 * 1024 * 1024,
  stream: NodeJS.ReadableStream = process.stdin
): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let bytesRead = 0;

    const onData = (chunk: Buffer | string): void => {
      const buf = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
      bytesRead += buf.length;

      // Stop buffering as soon as the limit is crossed
      if (bytesRead > maxBytes) {
        stream.pause();
        stream.removeListener("data", onData);
        reject(
          new CliError(`stdin too large (max ${maxBytes} bytes)`, { exitCode: EXIT_CODE.INVALID_ARGS })
        );
        return;
      }

      chunks.push(buf);
    };

    stream.on("data", onData);
    stream.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    stream.on("error", reject);
  });
}

/**
 * Read JSON from a file
 */
export async function readJsonFromFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidArgumentError(`Cannot read ${filePath}: ${reason}`);
  }
  return parseJson(content, `file ${filePath}`);
}

/**
 * Where a query document comes from
 */
export interface QuerySource {
  file?: string;
  data?: string;
}

/**
 * Load the raw query from --file, --data or stdin (in that order of preference)
 */
export async function readQueryInput(source: QuerySource, io: CliIO): Promise<unknown> {
  if (source.file !== undefined && source.data !== undefined) {
    throw new InvalidArgumentError("Cannot use both --file and --data; choose one or use stdin");
  }

  if (source.file !== undefined) {
    return readJsonFromFile(source.file);
  }
  if (source.data !== undefined) {
    return parseJson(source.data, "--data");
  }

  if (io.isStdinTTY()) {
    throw new InvalidArgumentError("No input provided. Use --file, --data, or pipe JSON to stdin");
  }
  return parseJson(await io.readStdin(), "stdin");
}

/**
 * Write to stdout
 */
export function writeStdout(content: string): void {
  process.stdout.write(content);
}

/**
 * Write to stderr
 */
export function writeStderr(content: string): void {
  process.stderr.write(content);
}

/**
 * Check if stdin is a TTY (interactive terminal)
 */
export function isStdinTTY(): boolean {
  return process.stdin.isTTY ?? false;
}

/**
 * The real process streams
 */
export const processIO: CliIO = {
  stdout: writeStdout,
  stderr: writeStderr,
  readStdin: () => readStdin(),
  isStdinTTY,
};
