#!/usr/bin/env -S node --import tsx
import { runCli } from "./run.js";

process.on("SIGINT", () => {
  console.error("\nDownload interrupted");
  process.exit(1);
});

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("[error]", (error as Error).message);
    process.exitCode = 1;
  });
