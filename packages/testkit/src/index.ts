export { assert, describe, test } from "./nodeTest.js";
export { createFixtureDir, type FixtureDir } from "./fixtures.js";
