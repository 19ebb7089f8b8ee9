/**
 * Test data generation framework
 *
 * @packageDocumentation
 */

// Variant hierarchy and target registry
export {
  BaseTarget,
  TargetRegistry,
  targetRegistry,
  TestGenerator,
  GeneratorOptionsSchema,
  resolveGeneratorOptions,
  DEFAULT_SUITE_DIRECTORY,
} from "./generation/index.js";

export type {
  TargetClass,
  GeneratorOptions,
  ResolvedGeneratorOptions,
  TargetGenerator,
  TargetProducer,
  TargetTable,
} from "./generation/index.js";

// Test case records and the data file sink
export {
  TestCase,
  TestCaseSchema,
  hexString,
  writeDataFile,
  dataFileHeader,
  DATA_FILE_FOOTER,
} from "./testcase/index.js";

export type { TestCaseData } from "./testcase/index.js";

// Command line driver
export {
  main,
  runCli,
  createProgram,
  resolveTargets,
  normalizeTargetName,
} from "./cli/main.js";

export type { GeneratorFactory, ProgramInfo } from "./cli/main.js";

// Library utilities
export {
  TestGenError,
  ValidationError,
  ConfigError,
  TargetNotFoundError,
  logger,
} from "./lib/index.js";

export type { LogLevel } from "./lib/index.js";

export { VERSION } from "./version.js";
