import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, it } from "node:test";
import { NoLinksError, noopLogger, type CrawlOptions } from "@tutorial-md/crawler";
import { createApp } from "../app.js";
import type { CrawlRunner } from "../env.js";

const createdTempDirs: string[] = [];

afterEach(async () => {
  await Promise.all(createdTempDirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })));
});

async function createTestApp(crawl?: CrawlRunner) {
  const outputRoot = await fs.mkdtemp(path.join(os.tmpdir(), "tutorial-md-api-"));
  createdTempDirs.push(outputRoot);
  const calls: CrawlOptions[] = [];

  const writingCrawl: CrawlRunner = async (options) => {
    calls.push(options);
    const outputPath = path.join(outputRoot, "example.com", options.filename ?? "all_in_one.md");
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, "# Contents\n\n- [Intro](#intro)\n");
    return { outputPath, pages: [options.config.baseUrl], failed: [], durationMs: 5 };
  };

  const app = createApp({
    deps: { crawl: crawl ?? writingCrawl, outputRoot, logger: noopLogger },
    requestLogging: false,
  });
  return { app, calls, outputRoot };
}

function post(body: unknown): RequestInit {
  return {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  };
}

describe("POST /api/download", () => {
  it("returns the generated Markdown as an attachment", async () => {
    const { app, calls, outputRoot } = await createTestApp();

    const res = await app.request(
      "/api/download",
      post({ url: "https://example.com/tut/", config: { type: "class", value: "urlList" }, filename: "指南.md" }),
    );

    assert.equal(res.status, 200);
    assert.equal(res.headers.get("Content-Type"), "text/markdown; charset=utf-8");
    assert.equal(res.headers.get("Content-Disposition"), "attachment; filename*=UTF-8''%E6%8C%87%E5%8D%97.md");
    assert.equal(await res.text(), "# Contents\n\n- [Intro](#intro)\n");

    assert.equal(calls.length, 1);
    assert.equal(calls[0].outputRoot, outputRoot);
    assert.equal(calls[0].filename, "指南.md");
    assert.deepEqual(calls[0].config.selector, { type: "class", value: "urlList" });
    assert.equal(calls[0].config.preRemove, undefined);
  });

  it("lets top-level pre-removal fields override the config", async () => {
    const { app, calls } = await createTestApp();

    const res = await app.request(
      "/api/download",
      post({
        url: "https://example.com/tut/",
        config: { type: "id", value: "toc", pre_remove_type: "class", pre_remove_value: "ads" },
        pre_remove_value: "footer|aside",
      }),
    );

    assert.equal(res.status, 200);
    assert.equal(res.headers.get("Content-Disposition"), "attachment; filename*=UTF-8''tutorial.md");
    assert.deepEqual(calls[0].config.preRemove, { type: "class", values: ["footer", "aside"] });
  });

  it("uses the config filename when the request has none", async () => {
    const { app, calls } = await createTestApp();

    await app.request(
      "/api/download",
      post({ url: "https://example.com/tut/", config: { type: "tag", value: "nav", filename: "guide.md" } }),
    );

    assert.equal(calls[0].filename, "guide.md");
  });

  it("rejects an invalid body with 400", async () => {
    const { app, calls } = await createTestApp();

    const badType = await app.request("/api/download", post({ url: "https://example.com/", config: { type: "css", value: "x" } }));
    const badName = await app.request(
      "/api/download",
      post({ url: "https://example.com/", config: { type: "class", value: "x" }, filename: "../escape.md" }),
    );

    assert.equal(badType.status, 400);
    assert.equal(badName.status, 400);
    assert.equal(calls.length, 0);
  });

  it("rejects a non-http URL with 400", async () => {
    const { app, calls } = await createTestApp();

    const res = await app.request("/api/download", post({ url: "ftp://example.com/tut/", config: { type: "class", value: "x" } }));

    assert.equal(res.status, 400);
    assert.deepEqual(await res.json(), { error: "Invalid crawl config: baseUrl: Expected an http(s) URL", stage: "idle" });
    assert.equal(calls.length, 0);
  });

  it("reports pipeline failures with their stage", async () => {
    const { app } = await createTestApp(async () => {
      throw new NoLinksError();
    });

    const res = await app.request("/api/download", post({ url: "https://example.com/tut/", config: { type: "class", value: "x" } }));

    assert.equal(res.status, 500);
    assert.deepEqual(await res.json(), { error: "No links discovered in the link container", stage: "extract-links" });
  });

  it("fails when the crawl reports an output file that does not exist", async () => {
    const { app } = await createTestApp(async (options) => ({
      outputPath: path.join(os.tmpdir(), "tutorial-md-api-missing", "missing.md"),
      pages: [options.config.baseUrl],
      failed: [],
      durationMs: 1,
    }));

    const res = await app.request("/api/download", post({ url: "https://example.com/tut/", config: { type: "class", value: "x" } }));

    assert.equal(res.status, 500);
    assert.deepEqual(await res.json(), { error: "Markdown file was not generated", stage: "persist" });
  });
});

describe("GET /health", () => {
  it("reports ok", async () => {
    const { app } = await createTestApp();

    const res = await app.request("/health");

    assert.equal(res.status, 200);
    assert.match(await res.text(), /^\{"status":"ok","timestamp":"\d{4}-/);
  });
});
