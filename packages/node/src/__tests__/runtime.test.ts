import { readFileSync } from "node:fs";
import { type LogRecord, silentSink } from "@glyphbox/core";
import { assert, createFixtureDir, describe, test } from "@glyphbox/testkit";
import { HIDE_CURSOR } from "../ansiBackend.js";
import { createNodeTerminal, defaultLogSink } from "../runtime.js";

describe("createNodeTerminal", () => {
  test("wires environment settings into the backend, logger and loop options", () => {
    const chunks: string[] = [];
    const records: LogRecord[] = [];
    const node = createNodeTerminal({
      env: { GLYPHBOX_FPS: "12", GLYPHBOX_LOG_LEVEL: "debug", GLYPHBOX_NO_ALT_SCREEN: "yes", NO_COLOR: "1" },
      input: null,
      output: { write: (chunk) => void chunks.push(chunk) },
      size: [2, 1],
      sink: (record) => void records.push(record),
    });
    assert.equal(node.config.fps, 12);
    assert.equal(node.loopOptions.fps, 12);
    assert.deepEqual(records[0], {
      level: "debug",
      scope: "node",
      message: "terminal configured",
      detail: { fps: 12, logPath: null, color: false },
    });

    node.terminal.start();
    assert.deepEqual(chunks, [`${HIDE_CURSOR}\u001b[?1003h\u001b[?1006h`, "\u001b[0m\u001b[2J\u001b[1;1H  "]);
    node.terminal.close();
    assert.equal(node.backend.isOpen, false);
  });

  test("drops log records unless a log file is configured", () => {
    assert.equal(defaultLogSink(null), silentSink);
    const node = createNodeTerminal({ env: {}, input: null, output: { write: () => undefined }, size: [1, 1] });
    assert.equal(node.config.logPath, null);
  });

  test("writes log records to the configured file", () => {
    const fixtures = createFixtureDir();
    try {
      const path = `${fixtures.dir}/run.log`;
      defaultLogSink(path)({ level: "warn", scope: "node", message: "slow frame" });
      const line: unknown = JSON.parse(readFileSync(path, "utf8"));
      assert.ok(typeof line === "object" && line !== null);
      assert.equal("message" in line ? line.message : undefined, "slow frame");
      assert.equal("level" in line ? line.level : undefined, "warn");
    } finally {
      fixtures.cleanup();
    }
  });
});
