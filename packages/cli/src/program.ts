/**
 * Command tree and top-level error handling for the qshape CLI
 */

import { Command, CommanderError, InvalidArgumentError } from "commander";
import { EXIT_CODE } from "@qshape/sdk";
import { registerQueryCommands, type GlobalOptions } from "./commands/query.js";
import { parseNamespaceList, parseNonNegativeInt } from "./lib/arg.js";
import { formatCliError, mapSdkErrorToExitCode } from "./lib/errors.js";
import { processIO, type CliIO } from "./lib/io.js";

export const VERSION = "0.1.0";

/**
 * Build the program; output goes through `io`, exits become thrown CommanderErrors
 */
export function createProgram(io: CliIO = processIO): Command {
  const program = new Command();

  program
    .configureOutput({
      writeOut: (str) => io.stdout(str),
      writeErr: (str) => io.stderr(str),
    })
    .exitOverride();

  program
    .name("qshape")
    .description("qshape - validate and normalize InstaQL queries before they are sent")
    .version(VERSION)
    .option("--max-depth <n>", "Maximum namespace nesting depth", (value: string) =>
      parseNonNegativeInt(value, "--max-depth")
    )
    .option(
      "--system-namespaces <list>",
      "Comma-separated $-prefixed namespaces allowed at the root",
      (value: string) => parseNamespaceList(value, "--system-namespaces")
    )
    .option("--raw", "Single-line JSON output")
    .option("--quiet", "Suppress non-error output")
    .option("--verbose", "Verbose diagnostics");

  registerQueryCommands(program, io);

  return program;
}

/**
 * Run the CLI against user arguments (no node/script prefix) and return the exit code
 */
export async function run(argv: readonly string[], io: CliIO = processIO): Promise<number> {
  const program = createProgram(io);

  try {
    await program.parseAsync([...argv], { from: "user" });
    return EXIT_CODE.SUCCESS;
  } catch (err) {
    // Commander has already written its own message for parse errors, help and version
    if (err instanceof CommanderError && !(err instanceof InvalidArgumentError)) {
      return err.exitCode === 0 ? EXIT_CODE.SUCCESS : EXIT_CODE.INVALID_ARGS;
    }

    const opts = program.opts<GlobalOptions>();
    io.stderr(`Error: ${formatCliError(err, opts.verbose === true)}\n`);
    return mapSdkErrorToExitCode(err);
  }
}
