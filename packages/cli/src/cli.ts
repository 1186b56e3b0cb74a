#!/usr/bin/env node

/**
 * qshape CLI entry point
 */

import { EXIT_CODE } from "@qshape/sdk";
import { formatCliError } from "./lib/errors.js";
import { processIO, writeStderr } from "./lib/io.js";
import { colorize } from "./lib/render.js";
import { run } from "./program.js";

async function main(): Promise<void> {
  process.exitCode = await run(process.argv.slice(2), {
    ...processIO,
    stderr: (content) => writeStderr(colorize(content, "red", process.stderr)),
  });
}

main().catch((err: unknown) => {
  writeStderr(`Error: ${formatCliError(err)}\n`);
  process.exitCode = EXIT_CODE.INTERNAL_ERROR;
});
