/**
 * Target registry and writer
 *
 * Maps data file basenames to the producers of their test cases and writes
 * each producer's output to `<directory>/<basename>.data`.
 */

import { z } from "zod";

import { ConfigError, TargetNotFoundError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { writeDataFile } from "../testcase/data-file.js";
import type { TestCase } from "../testcase/test-case.js";

export const DEFAULT_SUITE_DIRECTORY = "tests/suites";

/**
 * Generator options. Unknown keys are ignored.
 */
export const GeneratorOptionsSchema = z
  .object({
    /** Directory the data files are written to */
    directory: z.string().optional(),
    /** Name recorded in the generated file header */
    caller: z.string().min(1).optional(),
  })
  .passthrough();

export type GeneratorOptions = z.input<typeof GeneratorOptionsSchema>;

export interface ResolvedGeneratorOptions {
  directory: string;
  caller: string | undefined;
}

export function resolveGeneratorOptions(options: unknown = {}): ResolvedGeneratorOptions {
  const result = GeneratorOptionsSchema.safeParse(options ?? {});
  if (!result.success) {
    const first = result.error.issues[0];
    const detail = first ? `: ${[...first.path, first.message].join(": ")}` : "";
    throw new ConfigError(`Invalid generator options${detail}`, {
      issues: result.error.issues,
    });
  }

  return {
    directory: result.data.directory ?? DEFAULT_SUITE_DIRECTORY,
    caller: result.data.caller,
  };
}

export type TargetProducer<TArgs extends unknown[] = []> = (
  ...args: TArgs
) => Iterable<TestCase>;

export type TargetTable<TArgs extends unknown[] = []> = Readonly<
  Record<string, TargetProducer<TArgs>>
>;

/**
 * What the command line driver needs from a generator
 */
export interface TargetGenerator {
  targetNames(): string[];
  filenameFor(basename: string): string;
  generateTarget(name: string): void;
}

/**
 * Generate test data files.
 *
 * Producers that need shared context declare it in `TArgs`; a subclass then
 * overrides `generateTarget(name)` and passes the context on through
 * `super.generateTarget(name, ...context)`.
 */
export class TestGenerator<TArgs extends unknown[] = []> {
  readonly testSuiteDirectory: string;
  private readonly caller: string | undefined;

  constructor(
    options: GeneratorOptions = {},
    readonly targets: TargetTable<TArgs> = {}
  ) {
    const resolved = resolveGeneratorOptions(options);
    this.testSuiteDirectory = resolved.directory;
    this.caller = resolved.caller;
  }

  targetNames(): string[] {
    return Object.keys(this.targets).sort();
  }

  /**
   * The location of the data file with the specified base name.
   * Joined with "/" on every platform; an empty directory means the current
   * one and a trailing "/" is not doubled.
   */
  filenameFor(basename: string): string {
    const file = `${basename}.data`;
    const directory = this.testSuiteDirectory;
    if (directory === "" || directory.endsWith("/")) {
      return `${directory}${file}`;
    }
    return `${directory}/${file}`;
  }

  /**
   * Write the test cases to `basename + ".data"` in the test suite directory
   */
  writeTestDataFile(basename: string, testCases: Iterable<TestCase>): void {
    const filename = this.filenameFor(basename);
    const count =
      this.caller === undefined
        ? writeDataFile(filename, testCases)
        : writeDataFile(filename, testCases, this.caller);
    logger.debug(`Wrote ${count} test cases to ${filename}`);
  }

  /**
   * Generate cases and write the data file for one target.
   * @throws TargetNotFoundError if `name` is not in the target table
   */
  generateTarget(name: string, ...targetArgs: TArgs): void {
    const producer = Object.hasOwn(this.targets, name) ? this.targets[name] : undefined;
    if (producer === undefined) {
      throw new TargetNotFoundError(name);
    }

    this.writeTestDataFile(name, producer(...targetArgs));
  }
}
