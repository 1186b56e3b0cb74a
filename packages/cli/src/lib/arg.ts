/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);

  // Deeper trees than this are almost certainly generated by mistake
  if (parsed > 1000) {
    throw new InvalidArgumentError(`${name} must be <= 1000`);
  }

  return parsed;
}

/**
 * Parse a comma-separated list of system namespaces ("$users,$files")
 * An empty string yields an empty list
 */
export function parseNamespaceList(value: string, name: string): string[] {
  const entries = value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

  for (const entry of entries) {
    if (!/^\$[A-Za-z0-9_-]+$/.test(entry)) {
      throw new InvalidArgumentError(
        `${name} entries must start with "$" followed by letters, digits, "_" or "-": "${entry}"`
      );
    }
  }

  return entries;
}

/**
 * Parse JSON with descriptive error messages
 */
export function parseJson(value: string, source: string): unknown {
  try {
    // Strip BOM if present
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new InvalidArgumentError(`Invalid JSON in ${source}: ${err.message}`);
    }
    throw err;
  }
}
