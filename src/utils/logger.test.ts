import test from "node:test";
import assert from "node:assert/strict";

import { Logger, resolveLevel } from "./logger";

test("messages below the threshold are dropped", () => {
  const lines: string[] = [];
  const logger = new Logger("warn", (line) => lines.push(line));

  logger.debug("debug line");
  logger.info("info line");
  logger.warn("warn line");
  logger.error("error line", { requestId: "abc123" });

  assert.equal(lines.length, 2);
  assert.match(lines[0] ?? "", /warn line$/);
  assert.match(lines[1] ?? "", /error line .*\{"requestId":"abc123"\}/);
});

test("log level names are read case-insensitively with info as fallback", () => {
  assert.equal(resolveLevel("DEBUG"), "debug");
  assert.equal(resolveLevel(" warn "), "warn");
  assert.equal(resolveLevel("verbose"), "info");
  assert.equal(resolveLevel(undefined), "info");
});
