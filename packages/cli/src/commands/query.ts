/**
 * Query commands for CLI: validate, format, explain
 */

import type { Command } from "commander";
import {
  describeQuery,
  formatQuery,
  parseQuery,
  QueryValidationError,
  validate,
} from "@qshape/sdk";
import type { ValidatorOptions } from "@qshape/sdk";
import { resolveValidatorOptions } from "../lib/env.js";
import { readQueryInput, type CliIO, type QuerySource } from "../lib/io.js";
import { printJson, printLines } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";

/**
 * Options declared on the root program
 */
export type GlobalOptions = {
  maxDepth?: number;
  systemNamespaces?: string[];
  raw?: boolean;
  quiet?: boolean;
  verbose?: boolean;
};

function withInputOptions(command: Command): Command {
  return command
    .option("--file <path>", "Read query from JSON file")
    .option("--data <json>", "Inline JSON query");
}

function validatorOptions(opts: GlobalOptions): ValidatorOptions {
  return resolveValidatorOptions({ maxDepth: opts.maxDepth, systemNamespaces: opts.systemNamespaces });
}

/**
 * Register validate/format/explain on the program
 */
export function registerQueryCommands(program: Command, io: CliIO): void {
  withInputOptions(
    program
      .command("validate")
      .description("Validate a query and print its normalized form")
      .addHelpText(
        "after",
        `
Examples:
  $ qshape validate --data '{"goals":{"$":{"where":{"id":"goal-1"}}}}'
  $ qshape validate --file query.json
  $ cat query.json | qshape validate --raw`
      )
  ).action(async (source: QuerySource) => {
    await withTiming(
      "cli.validate",
      async () => {
        const opts = program.opts<GlobalOptions>();
        const raw = await readQueryInput(source, io);
        const outcome = validate(raw, validatorOptions(opts));

        switch (outcome.status) {
          case "ok":
            if (!opts.quiet) printJson(outcome.query, io.stdout, { raw: opts.raw });
            return;
          case "deferred":
            if (!opts.quiet) io.stdout("deferred\n");
            return;
          case "error":
            throw new QueryValidationError(outcome.error.kind, outcome.error.path, outcome.error.message);
        }
      },
      io.stderr
    );
  });

  withInputOptions(
    program.command("format").description("Print the canonical InstaQL form of a valid query")
  ).action(async (source: QuerySource) => {
    await withTiming(
      "cli.format",
      async () => {
        const opts = program.opts<GlobalOptions>();
        const query = parseQuery(await readQueryInput(source, io), validatorOptions(opts));
        if (opts.quiet) return;
        io.stdout(query === null ? "null\n" : formatQuery(query, opts.raw ? 0 : 2));
      },
      io.stderr
    );
  });

  withInputOptions(
    program.command("explain").description("Print a readable outline of a valid query")
  ).action(async (source: QuerySource) => {
    await withTiming(
      "cli.explain",
      async () => {
        const opts = program.opts<GlobalOptions>();
        const query = parseQuery(await readQueryInput(source, io), validatorOptions(opts));
        if (opts.quiet) return;
        if (query === null) {
          io.stdout("deferred\n");
          return;
        }
        printLines(describeQuery(query), io.stdout);
      },
      io.stderr
    );
  });
}
