/**
 * Name Groups CLI program
 *
 * Built per invocation so tests can drive it in-process with their own streams.
 */

import { Command, CommanderError } from "commander";
import { readFileSync } from "node:fs";
import {
  assertValid,
  checkTaskInput,
  createGrouper,
  groupingToObject,
  openTaskStore,
  taskToView,
} from "@namegroups/sdk";
import type { GroupingStrategy, TaskStore } from "@namegroups/sdk";
import { resolveRoot, isVerbose } from "./lib/env.js";
import { parseJson, parsePositiveInt, parseStrategy, toTaskInput } from "./lib/arg.js";
import { readStdin, readJsonFromFile, isInteractive } from "./lib/io.js";
import type { InputStream, OutputStream } from "./lib/io.js";
import { printJson, printLines, colorize } from "./lib/render.js";
import { CliError, EXIT_OK, mapSdkErrorToExitCode, formatCliError } from "./lib/errors.js";
import { withTiming } from "./lib/telemetry.js";
import type { TelemetryOptions } from "./lib/telemetry.js";

export interface CliIO {
  stdout: OutputStream;
  stderr: OutputStream;
  /** Absent when no input is attached */
  stdin?: InputStream;
  env?: NodeJS.ProcessEnv;
}

type GlobalOptions = {
  root?: string;
  verbose?: boolean;
  quiet?: boolean;
};

type GroupCommandOptions = {
  delimiter?: string;
  strategy?: GroupingStrategy;
  raw?: boolean;
};

type CreateCommandOptions = {
  file?: string;
  delimiter?: string;
  strategy?: GroupingStrategy;
};

type MoveCommandOptions = {
  name: string;
  from: string;
  to: string;
  expectVersion?: number;
};

function readPackageVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

/**
 * Parse piped input: JSON (object or array) or one name per line
 */
function parseStdinInput(text: string): Record<string, unknown> {
  const trimmed = text.trim();
  if (trimmed.startsWith("[") || trimmed.startsWith("{")) {
    return toTaskInput(parseJson(trimmed, "stdin"), "stdin");
  }

  const names = trimmed
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  return { names };
}

/**
 * Build the `namegroups` command tree bound to the given streams
 */
export function createProgram(io: CliIO): Command {
  const env = io.env ?? process.env;
  const program = new Command();

  // Output and exit handling must be configured before subcommands are added so they inherit it
  program
    .configureOutput({
      writeOut: (str) => io.stdout.write(str),
      writeErr: (str) => io.stderr.write(colorize(str, "red", io.stderr)),
    })
    .exitOverride();

  program
    .name("namegroups")
    .description("Name Groups - group names by shared prefix and move names between groups")
    .version(readPackageVersion())
    .option("--root <path>", "Data directory root")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output");

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  const telemetry = (): TelemetryOptions => ({
    sink: io.stderr,
    enabled: globals().verbose === true || isVerbose(env),
  });

  const openStore = (): { store: TaskStore; root: string } => {
    const root = resolveRoot(globals().root, env);
    return { store: openTaskStore({ root }), root };
  };

  // Init command
  program
    .command("init")
    .description("Initialize a new grouping task store")
    .action(async () => {
      await withTiming(
        "cli.init",
        async () => {
          const { store, root } = openStore();
          await store.init();

          if (!globals().quiet) {
            io.stdout.write(`Initialized store at ${root}\n`);
          }
        },
        telemetry()
      );
    });

  // Group command
  program
    .command("group <names...>")
    .description("Group names by prefix without storing a task")
    .option("--delimiter <char>", "Delimiter between words (default: _)")
    .option("--strategy <name>", "Grouping strategy: first-word or prefix-tree", parseStrategy)
    .option("--raw", "Output compact JSON")
    .action(async (names: string[], options: GroupCommandOptions) => {
      await withTiming(
        "cli.group",
        async () => {
          const input = assertValid(
            checkTaskInput({ names, delimiter: options.delimiter, strategy: options.strategy })
          );
          const grouping = createGrouper(input.strategy)(input.names, input.delimiter);

          printJson(io.stdout, groupingToObject(grouping), { raw: options.raw });
        },
        telemetry()
      );
    });

  // Create command
  program
    .command("create [names...]")
    .description("Create a grouping task from arguments, a JSON file or stdin")
    .option("--file <path>", "Read task input from JSON file")
    .option("--delimiter <char>", "Delimiter between words (default: _)")
    .option("--strategy <name>", "Grouping strategy: first-word or prefix-tree", parseStrategy)
    .action(async (names: string[], options: CreateCommandOptions) => {
      await withTiming(
        "cli.create",
        async () => {
          if (names.length > 0 && options.file) {
            throw new CliError("Cannot use both names and --file; choose one or use stdin");
          }

          let input: Record<string, unknown>;
          if (names.length > 0) {
            input = { names };
          } else if (options.file) {
            input = toTaskInput(await readJsonFromFile(options.file), `file ${options.file}`);
          } else {
            const stdin = io.stdin;
            if (stdin === undefined || isInteractive(stdin)) {
              throw new CliError(
                "No input provided. Pass names, use --file, or pipe names to stdin"
              );
            }
            input = parseStdinInput(await readStdin(stdin));
          }

          // Flags override values from the file or stdin
          if (options.delimiter !== undefined) input.delimiter = options.delimiter;
          if (options.strategy !== undefined) input.strategy = options.strategy;

          const { store } = openStore();
          const task = await store.create(input);

          io.stdout.write(`${task.id}\n`);
        },
        telemetry()
      );
    });

  // List command
  program
    .command("ls")
    .description("List grouping task ids in creation order")
    .option("--json", "Output as JSON array")
    .action(async (options: { json?: boolean }) => {
      await withTiming(
        "cli.ls",
        async () => {
          const { store } = openStore();
          const ids = (await store.list()).map((task) => task.id);

          if (options.json) {
            printJson(io.stdout, ids);
          } else {
            printLines(io.stdout, ids);
          }
        },
        telemetry()
      );
    });

  // Get command
  program
    .command("get <id>")
    .description("Show a grouping task")
    .option("--raw", "Output compact JSON")
    .action(async (id: string, options: { raw?: boolean }) => {
      await withTiming(
        "cli.get",
        async () => {
          const { store } = openStore();
          const task = await store.require(id);

          printJson(io.stdout, taskToView(task), { raw: options.raw });
        },
        telemetry()
      );
    });

  // Move command
  program
    .command("move <id>")
    .description("Move a name from one group of a task to another")
    .requiredOption("--name <name>", "Name to move")
    .requiredOption("--from <group>", "Group that currently holds the name")
    .requiredOption("--to <group>", "Group to move the name into")
    .option("--expect-version <n>", "Fail unless the task is at this version", (value: string) =>
      parsePositiveInt(value, "--expect-version")
    )
    .action(async (id: string, options: MoveCommandOptions) => {
      await withTiming(
        "cli.move",
        async () => {
          const { store } = openStore();
          const task = await store.move(id, {
            name: options.name,
            sourceGroup: options.from,
            targetGroup: options.to,
            expectedVersion: options.expectVersion,
          });

          printJson(io.stdout, taskToView(task));
        },
        telemetry()
      );
    });

  return program;
}

/**
 * Run the CLI with user arguments (no node/script prefix) and return the exit code
 */
export async function run(argv: readonly string[], io: CliIO): Promise<number> {
  const program = createProgram(io);

  try {
    await program.parseAsync([...argv], { from: "user" });
    return EXIT_OK;
  } catch (err) {
    // Commander has already printed its own usage errors, help and version output
    if (err instanceof CommanderError) {
      return err.exitCode;
    }

    const verbose = program.opts<GlobalOptions>().verbose === true || isVerbose(io.env ?? process.env);
    io.stderr.write(colorize(`Error: ${formatCliError(err, verbose)}`, "red", io.stderr) + "\n");
    return mapSdkErrorToExitCode(err);
  }
}
