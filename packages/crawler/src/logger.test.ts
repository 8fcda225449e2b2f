import assert from "node:assert/strict";
import { afterEach, describe, it, mock } from "node:test";
import { createLogger } from "./logger.js";
import type { LogLevel } from "./types.js";

afterEach(() => {
  mock.restoreAll();
});

describe("createLogger", () => {
  it("forwards records to the callback", () => {
    const records: Array<[LogLevel, string, string | undefined]> = [];
    const log = createLogger((level, message, url) => {
      records.push([level, message, url]);
    });

    log.info("Fetching https://ex.com/a", "https://ex.com/a");
    log.debug("Stage idle -> fetch-entry");

    assert.deepEqual(records, [
      ["info", "Fetching https://ex.com/a", "https://ex.com/a"],
      ["debug", "Stage idle -> fetch-entry", undefined],
    ]);
  });

  it("prints level-tagged lines to the console without a callback", () => {
    const logged = mock.method(console, "log", () => {});
    const warned = mock.method(console, "warn", () => {});

    const log = createLogger();
    log.info("Starting crawl");
    log.warn("Skipping page");

    assert.deepEqual(logged.mock.calls[0].arguments, ["[info]", "Starting crawl"]);
    assert.deepEqual(warned.mock.calls[0].arguments, ["[warn]", "Skipping page"]);
  });
});
