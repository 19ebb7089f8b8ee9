/**
 * Generator for the constant-time data files
 */

import {
  TestGenerator,
  type GeneratorOptions,
  type TargetTable,
} from "../../generation/test-generator.js";

import {
  ConstantTimeTarget,
  CtSizeMaskGeTarget,
  WORD_SIZES,
  type WordSize,
} from "./targets.js";

type ConstantTimeArgs = [wordSizes: readonly WordSize[]];

export const CONSTANT_TIME_TARGETS: TargetTable<ConstantTimeArgs> = {
  [ConstantTimeTarget.genFile]: () => ConstantTimeTarget.generateTests(),
  [CtSizeMaskGeTarget.genFile]: (wordSizes) => CtSizeMaskGeTarget.generateTestsFor(wordSizes),
};

export class ConstantTimeTestGenerator extends TestGenerator<ConstantTimeArgs> {
  constructor(
    options: GeneratorOptions = {},
    private readonly wordSizes: readonly WordSize[] = WORD_SIZES
  ) {
    super(options, CONSTANT_TIME_TARGETS);
  }

  override generateTarget(name: string): void {
    super.generateTarget(name, this.wordSizes);
  }
}
