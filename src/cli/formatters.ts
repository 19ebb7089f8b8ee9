import type { TargetGenerator } from "../generation/test-generator.js";

/**
 * Failure line for an error; the logger adds the color
 */
export function formatError(error: Error): string {
  return `Error: ${error.message}`;
}

/**
 * Output lines for `--list`: one data file path per target, sorted by name
 */
export function formatTargetList(generator: TargetGenerator): string[] {
  return generator.targetNames().map((name) => generator.filenameFor(name));
}

export function formatGenerationSummary(count: number): string {
  return count === 1 ? "Generated 1 data file" : `Generated ${count} data files`;
}
