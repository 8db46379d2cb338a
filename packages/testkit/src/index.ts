export { assert, describe, test } from "./nodeTest.js";
export { withTempDir, writeTree } from "./tempDir.js";
