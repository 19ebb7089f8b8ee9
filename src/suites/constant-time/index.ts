export {
  ConstantTimeTarget,
  CtMemcmpTarget,
  CtUintIfTarget,
  CtSizeMaskGeTarget,
  WORD_SIZES,
  patternBytes,
  type WordSize,
} from "./targets.js";

export {
  ConstantTimeTestGenerator,
  CONSTANT_TIME_TARGETS,
} from "./generator.js";
