/**
 * Test case records and the `.data` file sink
 */

export {
  TestCase,
  TestCaseSchema,
  hexString,
  type TestCaseData,
} from "./test-case.js";

export {
  writeDataFile,
  dataFileHeader,
  DATA_FILE_FOOTER,
} from "./data-file.js";
