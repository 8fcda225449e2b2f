import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { ConfigError } from "@tutorial-md/crawler";
import { parseCliArgs } from "./args.js";

describe("parseCliArgs", () => {
  it("applies defaults", () => {
    const args = parseCliArgs(["https://example.com/tutorial", "--value", "urlList"]);

    assert.equal(args.url, "https://example.com/tutorial");
    assert.equal(args.type, "class");
    assert.equal(args.value, "urlList");
    assert.equal(args.configPath, null);
    assert.equal(args.filename, "tutorial.md");
    assert.equal(args.delaySeconds, 1);
    assert.equal(args.preRemoveType, null);
    assert.equal(args.preRemoveValue, null);
    assert.equal(args.outputRoot, null);
    assert.equal(args.help, false);
  });

  it("reads every option", () => {
    const args = parseCliArgs([
      "https://example.com/tutorial",
      "--type",
      "id",
      "--value",
      "main-nav",
      "--filename",
      "guide.md",
      "--delay",
      "0.25",
      "--pre-remove-type",
      "tag",
      "--pre-remove-value",
      "footer|aside",
      "--output-root",
      "out",
      "--log-file",
      "logs/crawl.log",
    ]);

    assert.equal(args.type, "id");
    assert.equal(args.filename, "guide.md");
    assert.equal(args.delaySeconds, 0.25);
    assert.equal(args.preRemoveType, "tag");
    assert.equal(args.preRemoveValue, "footer|aside");
    assert.equal(args.outputRoot, "out");
    assert.equal(args.logFile, "logs/crawl.log");
  });

  it("rejects an unknown selector type", () => {
    assert.throws(
      () => parseCliArgs(["https://example.com/", "--type", "css", "--value", "nav"]),
      (error: unknown) => error instanceof ConfigError && error.message === '--type must be one of class, id, tag (got "css")',
    );
  });

  it("rejects a negative delay", () => {
    assert.throws(() => parseCliArgs(["https://example.com/", "--value", "nav", "--delay", "-1"]), ConfigError);
  });

  it("requires a URL unless help is requested", () => {
    assert.throws(() => parseCliArgs(["--value", "nav"]), /A tutorial URL is required/);
    assert.equal(parseCliArgs(["-h"]).help, true);
  });
});
