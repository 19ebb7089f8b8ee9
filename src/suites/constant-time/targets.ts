/**
 * Targets for the constant-time primitives
 */

import { BaseTarget } from "../../generation/base-target.js";
import { hexString, type TestCase } from "../../testcase/test-case.js";

export interface WordSize {
  bits: 32 | 64;
  /** Symbol a platform defines when it has this word size */
  dependency: string;
}

export const WORD_SIZES: readonly WordSize[] = [
  { bits: 32, dependency: "HAVE_INT32" },
  { bits: 64, dependency: "HAVE_INT64" },
];

function maxValue(wordSize: WordSize): bigint {
  return (1n << BigInt(wordSize.bits)) - 1n;
}

/**
 * Deterministic buffer of `length` bytes
 */
export function patternBytes(length: number, seed: number = 0): Uint8Array {
  const bytes = new Uint8Array(length);
  for (let i = 0; i < length; i++) {
    bytes[i] = (seed + i * 37 + 11) & 0xff;
  }
  return bytes;
}

/**
 * Common parent of the targets written to the constant-time data file
 */
export abstract class ConstantTimeTarget extends BaseTarget {
  static override readonly genFile: string = "test_suite_constant_time.generated";
}

export class CtMemcmpTarget extends ConstantTimeTarget {
  protected readonly title = "Constant-time memcmp";
  protected readonly func = "ct_memcmp";

  constructor(
    private readonly a: Uint8Array,
    private readonly b: Uint8Array
  ) {
    super();
  }

  private differsAt(): number {
    return this.a.findIndex((byte, i) => byte !== this.b[i]);
  }

  protected override get desc(): string {
    const index = this.differsAt();
    return index === -1
      ? `${this.a.length} bytes equal`
      : `${this.a.length} bytes differ at ${index}`;
  }

  override get args(): string[] {
    return [hexString(this.a), hexString(this.b), this.differsAt() === -1 ? "0" : "1"];
  }

  static override *generateTests(): Generator<TestCase> {
    for (const length of [1, 4, 16]) {
      const a = patternBytes(length);
      yield new CtMemcmpTarget(a, patternBytes(length)).createTestCase();

      const first = patternBytes(length);
      first[0] = (a[0] ?? 0) ^ 0x01;
      yield new CtMemcmpTarget(a, first).createTestCase();

      if (length > 1) {
        const last = patternBytes(length);
        last[length - 1] = (a[length - 1] ?? 0) ^ 0x80;
        yield new CtMemcmpTarget(a, last).createTestCase();
      }
    }
  }
}

export class CtUintIfTarget extends ConstantTimeTarget {
  protected readonly title = "Constant-time select";
  protected readonly func = "ct_uint_if";

  constructor(
    private readonly condition: number,
    private readonly ifTrue: number,
    private readonly ifFalse: number
  ) {
    super();
  }

  protected override get desc(): string {
    return `condition ${this.condition}`;
  }

  override get args(): string[] {
    const expected = this.condition !== 0 ? this.ifTrue : this.ifFalse;
    return [this.condition, this.ifTrue, this.ifFalse, expected].map(String);
  }

  static override *generateTests(): Generator<TestCase> {
    for (const condition of [0, 1, 0x80000000]) {
      yield new CtUintIfTarget(condition, 0x12345678, 0x9abcdef0).createTestCase();
    }
  }
}

BaseTarget.register(ConstantTimeTarget);
BaseTarget.register(CtMemcmpTarget);
BaseTarget.register(CtUintIfTarget);

/**
 * Masks depend on the platform word size, so these cases are produced per
 * word size instead of through the registry.
 */
export class CtSizeMaskGeTarget extends BaseTarget {
  static override readonly genFile: string = "test_suite_constant_time_mask.generated";

  protected readonly title = "Constant-time size mask (>=)";
  protected readonly func = "ct_size_mask_ge";

  constructor(
    private readonly x: bigint,
    private readonly y: bigint,
    private readonly wordSize: WordSize
  ) {
    super();
  }

  protected override get desc(): string {
    return `${this.wordSize.bits}-bit ${this.x} >= ${this.y}`;
  }

  override get args(): string[] {
    const mask = this.x >= this.y ? maxValue(this.wordSize) : 0n;
    return [this.x, this.y, mask].map(String);
  }

  override createTestCase(): TestCase {
    return super.createTestCase().setDependencies([this.wordSize.dependency]);
  }

  static *generateTestsFor(wordSizes: readonly WordSize[]): Generator<TestCase> {
    for (const wordSize of wordSizes) {
      const max = maxValue(wordSize);
      const pairs: Array<[bigint, bigint]> = [
        [0n, 0n],
        [1n, 0n],
        [0n, 1n],
        [max, 0n],
        [max - 1n, max],
      ];
      for (const [x, y] of pairs) {
        yield new CtSizeMaskGeTarget(x, y, wordSize).createTestCase();
      }
    }
  }
}
