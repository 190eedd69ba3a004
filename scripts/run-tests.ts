/**
 * scripts/run-tests.ts — Runs every workspace test file under `node --test`.
 */

import { spawnSync } from "node:child_process";
import { fileURLToPath } from "node:url";
import { collectTestFiles } from "./testFiles.js";

const root = fileURLToPath(new URL("..", import.meta.url));
const files = collectTestFiles(root, ["packages", "scripts"]);
if (files.length === 0) {
  console.error("run-tests: no test files found");
  process.exit(1);
}
const result = spawnSync(process.execPath, ["--import", "tsx", "--test", ...files], { cwd: root, stdio: "inherit" });
process.exit(result.status ?? 1);
