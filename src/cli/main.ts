/**
 * Command line driver shared by every generator script
 *
 * Usage: <script> [--list] [-d <dir>] [TARGET...]
 */

import { Command, CommanderError } from "commander";
import { z } from "zod";

import { ConfigError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import {
  TestGenerator,
  type GeneratorOptions,
  type TargetGenerator,
} from "../generation/test-generator.js";
import { VERSION } from "../version.js";

import { formatError, formatGenerationSummary, formatTargetList } from "./formatters.js";

export type GeneratorFactory = (options: GeneratorOptions) => TargetGenerator;

export interface ProgramInfo {
  name: string;
  description: string;
  version?: string;
}

const CliOptionsSchema = z.object({
  list: z.boolean().optional(),
  directory: z.string().optional(),
  verbose: z.boolean().optional(),
  quiet: z.boolean().optional(),
});

const DEFAULT_PROGRAM: ProgramInfo = {
  name: "testgen",
  description: "Generate test data files",
};

const defaultFactory: GeneratorFactory = (options) => new TestGenerator(options);

/**
 * Reduce a target argument to a target name.
 * "foo", "foo.data" and "dir/foo.data" all become "foo". Only "/" separates
 * path components, so "dir\foo.data" becomes "dir\foo".
 */
export function normalizeTargetName(target: string): string {
  const stripped = target.replace(/\.data$/, "");
  return stripped.slice(stripped.lastIndexOf("/") + 1);
}

/**
 * Decide which targets to generate.
 *
 * With no requested targets every available target is selected, sorted.
 * A "-" argument selects nothing, so `script - $targets` works whether or not
 * `$targets` is empty.
 */
export function resolveTargets(
  requested: readonly string[],
  available: readonly string[]
): string[] {
  if (requested.length === 0) {
    return [...available].sort();
  }
  return requested.filter((target) => target !== "-").map(normalizeTargetName);
}

/**
 * Build the command for a generator. Parse errors and `--help` throw a
 * CommanderError instead of exiting the process.
 */
export function createProgram(
  createGenerator: GeneratorFactory = defaultFactory,
  info: ProgramInfo = DEFAULT_PROGRAM
): Command {
  const program = new Command();

  program
    .name(info.name)
    .description(info.description)
    .version(info.version ?? VERSION)
    .argument("[targets...]", 'Target file to generate (default: all; "-": none)')
    .option("--list", "List available targets and exit")
    .option("-d, --directory <dir>", "Directory to write data files to (default: tests/suites)")
    .option("-v, --verbose", "Verbose output")
    .option("-q, --quiet", "Quiet mode (errors only)")
    .exitOverride()
    .action((targets: string[], rawOptions: unknown) => {
      const parsed = CliOptionsSchema.safeParse(rawOptions);
      if (!parsed.success) {
        throw new ConfigError("Invalid command line options", { issues: parsed.error.issues });
      }
      const options = parsed.data;

      if (options.quiet) {
        logger.configure({ level: "error" });
      } else if (options.verbose) {
        logger.configure({ level: "debug" });
      } else {
        logger.configure({ level: "info" });
      }

      const generator = createGenerator({ directory: options.directory, caller: info.name });

      if (options.list) {
        for (const line of formatTargetList(generator)) {
          console.log(line);
        }
        return;
      }

      const selected = resolveTargets(targets, generator.targetNames());
      logger.debug(`Selected targets: ${selected.join(", ") || "(none)"}`);

      for (const target of selected) {
        logger.debug(`Generating ${generator.filenameFor(target)}`);
        generator.generateTarget(target);
      }

      logger.success(formatGenerationSummary(selected.length));
    });

  return program;
}

/**
 * Command line entry point. `args` excludes the node and script paths.
 */
export function main(
  args: readonly string[],
  createGenerator: GeneratorFactory = defaultFactory,
  info: ProgramInfo = DEFAULT_PROGRAM
): void {
  createProgram(createGenerator, info).parse([...args], { from: "user" });
}

/**
 * Run `main` for a generator script and return the process exit code.
 * Failures are reported through the logger as a single line.
 */
export function runCli(
  args: readonly string[],
  createGenerator: GeneratorFactory = defaultFactory,
  info: ProgramInfo = DEFAULT_PROGRAM
): number {
  try {
    main(args, createGenerator, info);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      // Help, version and usage errors have already been printed
      return error.exitCode;
    }
    logger.error(formatError(error instanceof Error ? error : new Error(String(error))));
    return 1;
  }
}
