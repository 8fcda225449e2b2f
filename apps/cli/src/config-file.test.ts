import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, it } from "node:test";
import { ConfigError } from "@tutorial-md/crawler";
import { loadTutorialConfig } from "./config-file.js";

const createdTempDirs: string[] = [];

afterEach(async () => {
  await Promise.all(createdTempDirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })));
});

async function tempDir(): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "tutorial-md-cli-"));
  createdTempDirs.push(dir);
  return dir;
}

describe("loadTutorialConfig", () => {
  it("reads a valid config file", async () => {
    const dir = await tempDir();
    const configPath = path.join(dir, "tutorial.json");
    await fs.writeFile(
      configPath,
      JSON.stringify({ type: "class", value: "urlList", filename: "guide.md", pre_remove_value: "ads" }),
    );

    assert.deepEqual(await loadTutorialConfig(configPath), {
      type: "class",
      value: "urlList",
      filename: "guide.md",
      pre_remove_value: "ads",
    });
  });

  it("rejects a config without a value", async () => {
    const dir = await tempDir();
    const configPath = path.join(dir, "tutorial.json");
    await fs.writeFile(configPath, JSON.stringify({ type: "id" }));

    await assert.rejects(loadTutorialConfig(configPath), ConfigError);
  });

  it("reports unreadable JSON as a config error", async () => {
    const dir = await tempDir();
    const configPath = path.join(dir, "broken.json");
    await fs.writeFile(configPath, "{ not json");

    await assert.rejects(
      loadTutorialConfig(configPath),
      (error: unknown) => error instanceof ConfigError && error.message.startsWith(`Failed to load config file ${configPath}:`),
    );
  });
});
