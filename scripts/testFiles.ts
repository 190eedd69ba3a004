/**
 * scripts/testFiles.ts — Finds every test file in the workspace.
 *
 * Node 20 neither expands globs for `--test` nor picks up `.ts` files on its
 * own, so the runner is handed an explicit list.
 */

import { readdirSync } from "node:fs";
import { join, relative, sep } from "node:path";

const TEST_FILE = /\.test\.ts$/;

/** `*.test.ts` files inside `__tests__` directories under `dirs`, relative to `root`, sorted. */
export function collectTestFiles(root: string, dirs: readonly string[]): string[] {
  const out: string[] = [];
  for (const dir of dirs) {
    for (const entry of readdirSync(join(root, dir), { recursive: true, withFileTypes: true })) {
      if (!entry.isFile() || !TEST_FILE.test(entry.name)) continue;
      const path = relative(root, join(entry.parentPath ?? entry.path, entry.name));
      const parts = path.split(sep);
      if (parts.includes("__tests__") && !parts.includes("node_modules")) out.push(parts.join("/"));
    }
  }
  return out.sort();
}
