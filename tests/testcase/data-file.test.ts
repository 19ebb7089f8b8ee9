import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";

import { afterEach, beforeEach, describe, it, expect } from "vitest";

import { TestCase } from "../../src/testcase/test-case.js";
import { writeDataFile, dataFileHeader, DATA_FILE_FOOTER } from "../../src/testcase/data-file.js";

describe("writeDataFile", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "datafile-test-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes header, cases and footer", () => {
    const filename = join(dir, "out.data");
    const count = writeDataFile(
      filename,
      [TestCase.of("A", "f", ["1"]), TestCase.of("B", "f", ["2"])],
      "gen-test"
    );

    expect(count).toBe(2);
    expect(readFileSync(filename, "utf-8")).toBe(
      "# Automatically generated by gen-test. Do not edit!\n" +
        "\nA\nf:1\n" +
        "\nB\nf:2\n" +
        "\n# End of automatically generated file.\n"
    );
    expect(existsSync(`${filename}.new`)).toBe(false);
  });

  it("writes only header and footer for an empty sequence", () => {
    const filename = join(dir, "empty.data");
    expect(writeDataFile(filename, [], "gen-test")).toBe(0);
    expect(readFileSync(filename, "utf-8")).toBe(
      `${dataFileHeader("gen-test")}\n\n${DATA_FILE_FOOTER}\n`
    );
  });

  it("creates missing parent directories", () => {
    const filename = join(dir, "nested", "suites", "x.data");
    writeDataFile(filename, [TestCase.of("A", "f", [])], "gen-test");
    expect(existsSync(filename)).toBe(true);
  });

  it("pulls lazy cases one at a time in order", () => {
    const events: string[] = [];
    function* produce(): Generator<TestCase> {
      for (const name of ["first", "second", "third"]) {
        events.push(`produce ${name}`);
        yield TestCase.of(name, "f", []);
      }
      events.push("done");
    }

    const count = writeDataFile(join(dir, "lazy.data"), produce(), "gen-test");

    expect(count).toBe(3);
    expect(events).toEqual(["produce first", "produce second", "produce third", "done"]);
    const lines = readFileSync(join(dir, "lazy.data"), "utf-8").split("\n");
    expect(lines.filter((line) => ["first", "second", "third"].includes(line))).toEqual([
      "first",
      "second",
      "third",
    ]);
  });

  it("leaves an existing file untouched when a producer fails", () => {
    const filename = join(dir, "keep.data");
    writeFileSync(filename, "previous contents\n");

    function* failing(): Generator<TestCase> {
      yield TestCase.of("ok", "f", []);
      throw new Error("producer failed");
    }

    expect(() => writeDataFile(filename, failing(), "gen-test")).toThrow("producer failed");
    expect(readFileSync(filename, "utf-8")).toBe("previous contents\n");
    expect(existsSync(`${filename}.new`)).toBe(false);
  });

  it("removes directories it created when a producer fails", () => {
    const filename = join(dir, "nested", "suites", "x.data");

    function* failing(): Generator<TestCase> {
      throw new Error("producer failed");
    }

    expect(() => writeDataFile(filename, failing(), "gen-test")).toThrow("producer failed");
    expect(existsSync(join(dir, "nested"))).toBe(false);
    expect(existsSync(dir)).toBe(true);
  });

  it("does not create the file when a case is incomplete", () => {
    const filename = join(dir, "bad.data");
    expect(() => writeDataFile(filename, [new TestCase("no function")], "gen-test")).toThrow(
      "Test case is missing a function"
    );
    expect(existsSync(filename)).toBe(false);
    expect(existsSync(`${filename}.new`)).toBe(false);
  });
});
