/**
 * Variant hierarchy
 *
 * A target describes one family of test cases for a library function.
 * Concrete targets subclass {@link BaseTarget}, override the static
 * `generateTests` to instantiate themselves, and register under their parent
 * class. Calling `generateTests` on any class in the hierarchy then walks
 * every registered subclass below it in name order.
 */

import { ValidationError } from "../lib/errors.js";
import { TestCase } from "../testcase/test-case.js";

/**
 * Static side of a target class
 */
export interface TargetClass {
  readonly name: string;
  readonly prototype: BaseTarget;
  generateTests(): Iterable<TestCase>;
}

interface RegistryEntry {
  name: string;
  targetClass: TargetClass;
}

function compareNames(a: RegistryEntry, b: RegistryEntry): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * Process-wide record of target subclasses and their instance counters
 */
export class TargetRegistry {
  /** Registered subclasses, keyed by their direct parent class */
  private readonly children = new Map<unknown, RegistryEntry[]>();
  private readonly registered = new Set<unknown>();
  private readonly counters = new Map<unknown, number>();

  register(targetClass: TargetClass, name: string = targetClass.name): void {
    if (this.registered.has(targetClass)) {
      throw new ValidationError(`Target class already registered: ${name}`, { name });
    }

    const parent: unknown = Object.getPrototypeOf(targetClass);
    const siblings = this.children.get(parent) ?? [];
    if (siblings.some((entry) => entry.name === name)) {
      throw new ValidationError(`Duplicate target class name: ${name}`, { name });
    }

    siblings.push({ name, targetClass });
    siblings.sort(compareNames);
    this.children.set(parent, siblings);
    this.registered.add(targetClass);
  }

  /**
   * Direct subclasses of `parent`, sorted by registered name
   */
  subclassesOf(parent: unknown): TargetClass[] {
    return (this.children.get(parent) ?? []).map((entry) => entry.targetClass);
  }

  /**
   * Advance the counter of `targetClass` and return the new value (1-based)
   */
  nextCount(targetClass: unknown): number {
    const count = (this.counters.get(targetClass) ?? 0) + 1;
    this.counters.set(targetClass, count);
    return count;
  }

  resetCounters(): void {
    this.counters.clear();
  }
}

export const targetRegistry = new TargetRegistry();

export abstract class BaseTarget {
  /** Basename of the data file this target's cases are written to */
  static readonly genFile: string = "";

  /** Description of the test function/purpose */
  protected abstract readonly title: string;

  /** Function which the class generates tests for */
  protected abstract readonly func: string;

  /** Number of this instance among instances of its class */
  readonly count: number;

  constructor() {
    this.count = targetRegistry.nextCount(new.target);
  }

  /**
   * Short description of this particular case
   */
  protected get desc(): string {
    return "";
  }

  /**
   * Arguments of the test case, in data-file syntax
   */
  get args(): string[] {
    return [];
  }

  get description(): string {
    return `${this.title} #${this.count} ${this.desc}`;
  }

  createTestCase(): TestCase {
    return TestCase.of(this.description, this.func, this.args);
  }

  /**
   * Add `targetClass` to the enumeration of its parent class
   */
  static register(targetClass: TargetClass, name?: string): void {
    targetRegistry.register(targetClass, name);
  }

  /**
   * Generate test cases for the registered subclasses of this class.
   *
   * Concrete targets override this to emit their own cases.
   */
  static *generateTests(): Generator<TestCase> {
    for (const subclass of targetRegistry.subclassesOf(this)) {
      yield* subclass.generateTests();
    }
  }
}
