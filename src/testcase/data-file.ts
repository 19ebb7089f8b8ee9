/**
 * Data file sink
 *
 * Writes a sequence of test cases to a `.data` file. Output goes to a
 * sibling `.new` file that is renamed over the target once every case has
 * been written, so an interrupted run never leaves a half-written file.
 */

import { closeSync, mkdirSync, openSync, renameSync, rmSync, writeSync } from "fs";
import { basename, dirname } from "path";

import type { TestCase } from "./test-case.js";

export const DATA_FILE_FOOTER = "# End of automatically generated file.";

export function dataFileHeader(caller: string): string {
  return `# Automatically generated by ${caller}. Do not edit!`;
}

function defaultCaller(): string {
  const script = process.argv[1];
  return script ? basename(script) : "testgen";
}

/**
 * Write test cases to `filename`, consuming `testCases` once, in order.
 * Parent directories created for the file are removed again if writing fails.
 *
 * @returns the number of test cases written
 */
export function writeDataFile(
  filename: string,
  testCases: Iterable<TestCase>,
  caller: string = defaultCaller()
): number {
  const tempFilename = `${filename}.new`;
  // First directory created, if any
  const createdDirectory = mkdirSync(dirname(filename), { recursive: true });

  const fd = openSync(tempFilename, "w");
  let count = 0;
  let open = true;
  let committed = false;
  try {
    writeSync(fd, `${dataFileHeader(caller)}\n`);
    for (const testCase of testCases) {
      writeSync(fd, testCase.serialize().map((line) => `${line}\n`).join(""));
      count++;
    }
    writeSync(fd, `\n${DATA_FILE_FOOTER}\n`);
    closeSync(fd);
    open = false;
    renameSync(tempFilename, filename);
    committed = true;
  } finally {
    if (open) {
      closeSync(fd);
    }
    if (!committed) {
      rmSync(tempFilename, { force: true });
      if (createdDirectory !== undefined) {
        rmSync(createdDirectory, { recursive: true, force: true });
      }
    }
  }

  return count;
}
