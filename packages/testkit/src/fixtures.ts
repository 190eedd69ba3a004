/**
 * packages/testkit/src/fixtures.ts — Scratch fixture files for loader tests.
 *
 * Why: Loader tests need real files on disk but must not depend on the repo
 * layout or leave anything behind. Each call gets its own temp directory.
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

export type FixtureDir = Readonly<{
  dir: string;
  write: (name: string, contents: string) => string;
  cleanup: () => void;
}>;

export function createFixtureDir(prefix = "glyphbox-"): FixtureDir {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  return Object.freeze({
    dir,
    write(name: string, contents: string): string {
      const path = join(dir, name);
      mkdirSync(dirname(path), { recursive: true });
      writeFileSync(path, contents, "utf8");
      return path;
    },
    cleanup(): void {
      rmSync(dir, { recursive: true, force: true });
    },
  });
}
