#!/usr/bin/env node
/**
 * generate-constant-time-tests
 *
 * Writes the constant-time data files:
 * - test_suite_constant_time.generated.data
 * - test_suite_constant_time_mask.generated.data
 */

import { ConstantTimeTestGenerator } from "../suites/constant-time/index.js";

import { runCli } from "./main.js";

process.exitCode = runCli(
  process.argv.slice(2),
  (options) => new ConstantTimeTestGenerator(options),
  {
    name: "generate-constant-time-tests",
    description: "Generate test data for the constant-time primitives",
  }
);
