// Error classes
export {
  TestGenError,
  ValidationError,
  ConfigError,
  TargetNotFoundError,
} from "./errors.js";

// Logger
export { logger } from "./logger.js";
export type { LogLevel } from "./logger.js";
