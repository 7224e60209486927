import test from "node:test";
import assert from "node:assert/strict";
import { ConfigurationError } from "../../errors/DocumentErrors.js";
import { Logger, parseLogLevel } from "../Logger.js";

test("parseLogLevel normalizes and rejects unknown levels", () => {
  assert.equal(parseLogLevel(" WARN "), "warn");
  assert.equal(parseLogLevel(undefined), undefined);
  assert.equal(parseLogLevel(""), undefined);
  assert.throws(
    () => parseLogLevel("loud", "REQFORGE_LOG_LEVEL"),
    (error: unknown) =>
      error instanceof ConfigurationError &&
      error.message === "Invalid REQFORGE_LOG_LEVEL: expected one of debug, info, warn, error, silent",
  );
});

test("messages below the level are dropped and tags prefix output", () => {
  const logger = new Logger({ level: "warn" }).child("run");
  assert.equal(logger.enabled("info"), false);
  assert.equal(logger.enabled("error"), true);
  assert.equal(Logger.silent().enabled("error"), false);

  const warnings: string[] = [];
  const infos: string[] = [];
  const originalWarn = console.warn;
  const originalInfo = console.info;
  console.warn = (message: string) => {
    warnings.push(message);
  };
  console.info = (message: string) => {
    infos.push(message);
  };
  try {
    logger.info("starting");
    logger.warn("section blocked");
  } finally {
    console.warn = originalWarn;
    console.info = originalInfo;
  }
  assert.deepEqual(infos, []);
  assert.deepEqual(warnings, ["[run] section blocked"]);
});
