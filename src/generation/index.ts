/**
 * Test generation core
 *
 * Target classes produce test cases; a generator maps data file names to
 * producers and writes their output.
 */

export {
  BaseTarget,
  TargetRegistry,
  targetRegistry,
  type TargetClass,
} from "./base-target.js";

export {
  TestGenerator,
  GeneratorOptionsSchema,
  resolveGeneratorOptions,
  DEFAULT_SUITE_DIRECTORY,
  type GeneratorOptions,
  type ResolvedGeneratorOptions,
  type TargetGenerator,
  type TargetProducer,
  type TargetTable,
} from "./test-generator.js";
