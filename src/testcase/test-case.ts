/**
 * Test case record
 *
 * One entry of a `.data` file: a description line, an optional
 * `depends_on:` line and a `function:arg:arg` line, optionally preceded by
 * `#` comment lines.
 */

import { z } from "zod";

import { ValidationError } from "../lib/errors.js";

const SINGLE_LINE = /^[^\r\n]*$/;

/**
 * Schema a test case must satisfy before it is serialized
 */
export const TestCaseSchema = z.object({
  /** Human-readable description, unique within a data file */
  description: z
    .string({ required_error: "Test case is missing a description" })
    .min(1, "Description must not be empty")
    .regex(SINGLE_LINE, "Description must be a single line"),

  /** Name of the test function in the test suite */
  function: z
    .string({ required_error: "Test case is missing a function" })
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "Function must be an identifier"),

  /** Arguments, already encoded in data-file syntax */
  arguments: z.array(z.string().regex(SINGLE_LINE, "Argument must be a single line")),

  /** Compile-time symbols the case depends on */
  dependencies: z.array(
    z.string().min(1).regex(/^[^\r\n:]*$/, "Dependency must be a single token")
  ),

  comments: z.array(z.string().regex(SINGLE_LINE, "Comment must be a single line")),
});

export type TestCaseData = z.infer<typeof TestCaseSchema>;

export class TestCase {
  private description: string | undefined;
  private function: string | undefined;
  private arguments: string[] = [];
  private dependencies: string[] = [];
  private readonly comments: string[] = [];

  constructor(description?: string) {
    this.description = description;
  }

  /**
   * Build a complete test case in one call
   */
  static of(description: string, func: string, args: readonly string[]): TestCase {
    return new TestCase(description).setFunction(func).setArguments(args);
  }

  addComment(...lines: string[]): this {
    this.comments.push(...lines);
    return this;
  }

  setDescription(description: string): this {
    this.description = description;
    return this;
  }

  setDependencies(dependencies: readonly string[]): this {
    this.dependencies = [...dependencies];
    return this;
  }

  setFunction(func: string): this {
    this.function = func;
    return this;
  }

  setArguments(args: readonly string[]): this {
    this.arguments = [...args];
    return this;
  }

  /**
   * Validate the record and return a snapshot of its fields.
   * @throws ValidationError listing every problem found
   */
  checkCompleteness(): TestCaseData {
    const result = TestCaseSchema.safeParse({
      description: this.description,
      function: this.function,
      arguments: this.arguments,
      dependencies: this.dependencies,
      comments: this.comments,
    });

    if (!result.success) {
      const first = result.error.issues[0];
      throw new ValidationError(first?.message ?? "Invalid test case", {
        description: this.description,
        issues: result.error.issues,
      });
    }

    return result.data;
  }

  /**
   * Lines of this record in data-file syntax, without trailing newlines
   */
  serialize(): string[] {
    const data = this.checkCompleteness();
    const lines: string[] = [];

    if (data.comments.length > 0) {
      lines.push("");
    }
    for (const comment of data.comments) {
      lines.push(`# ${comment}`);
    }

    lines.push("");
    lines.push(data.description);
    if (data.dependencies.length > 0) {
      lines.push(`depends_on:${data.dependencies.join(":")}`);
    }
    lines.push(`${data.function}:${data.arguments.join(":")}`);

    return lines;
  }
}

/**
 * Encode bytes as a quoted hex string argument
 */
export function hexString(data: Uint8Array): string {
  return `"${Buffer.from(data).toString("hex")}"`;
}
