export { createTempDir, removeDir, writeFixture, withTempDir } from "./fs.js";
