import path from "node:path";
import {
  crawlTutorial,
  createLogger,
  DEFAULT_OUTPUT_ROOT,
  isCrawlError,
  toCrawlConfig,
  type CrawlConfig,
  type CrawlOptions,
  type CrawlResult,
  type TutorialConfig,
} from "@tutorial-md/crawler";
import { parseCliArgs, USAGE, type CliArgs } from "./args.js";
import { loadTutorialConfig } from "./config-file.js";
import { fileLogCallback, withConsole } from "./log-file.js";

export type RunSettings = {
  config: CrawlConfig;
  filename: string;
  delayMs: number;
  outputRoot: string;
  logFile: string | null;
};

export interface CliDeps {
  crawl: (options: CrawlOptions) => Promise<CrawlResult>;
  loadConfig: (configPath: string) => Promise<TutorialConfig>;
  print: (line: string) => void;
  printError: (line: string) => void;
}

const defaultDeps: CliDeps = {
  crawl: crawlTutorial,
  loadConfig: loadTutorialConfig,
  print: (line) => console.log(line),
  printError: (line) => console.error(line),
};

/**
 * A config file supplies the selector, and its filename and pre-removal
 * fields win over the flags. Without one, `--value` is required and flag
 * pre-removal applies only when both flags are given.
 */
export async function resolveSettings(
  args: CliArgs,
  loadConfig: CliDeps["loadConfig"] = loadTutorialConfig,
): Promise<RunSettings> {
  let tutorial: TutorialConfig;
  let filename = args.filename;

  if (args.configPath) {
    tutorial = await loadConfig(args.configPath);
    if (tutorial.filename) filename = tutorial.filename;
  } else {
    if (!args.value) {
      throw new Error("--value is required unless --config is given");
    }
    const withRemoval = args.preRemoveType !== null && args.preRemoveValue !== null;
    tutorial = {
      type: args.type,
      value: args.value,
      pre_remove_type: withRemoval ? args.preRemoveType : null,
      pre_remove_value: withRemoval ? args.preRemoveValue : null,
    };
  }

  return {
    config: toCrawlConfig(args.url, tutorial),
    filename,
    delayMs: Math.round(args.delaySeconds * 1000),
    outputRoot: args.outputRoot ?? DEFAULT_OUTPUT_ROOT,
    logFile: args.logFile,
  };
}

function describeSettings(settings: RunSettings): string[] {
  const { config } = settings;
  const removal = config.preRemove ? `${config.preRemove.type}=${config.preRemove.values.join("|")}` : "none";
  return [
    `URL: ${config.baseUrl}`,
    `Link container: ${config.selector.type}="${config.selector.value}"`,
    `Pre-removal: ${removal}`,
    `Output file: ${settings.filename}`,
    `Output root: ${path.resolve(settings.outputRoot)}`,
    "-".repeat(50),
  ];
}

/** Returns the process exit code. */
export async function runCli(argv: string[], deps: CliDeps = defaultDeps): Promise<number> {
  let settings: RunSettings;
  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      deps.print(USAGE);
      return 0;
    }
    settings = await resolveSettings(args, deps.loadConfig);
  } catch (error) {
    deps.printError(`Error: ${(error as Error).message}`);
    deps.printError(USAGE);
    return 1;
  }

  for (const line of describeSettings(settings)) deps.print(line);

  try {
    const result = await deps.crawl({
      config: settings.config,
      outputRoot: settings.outputRoot,
      filename: settings.filename,
      delayMs: settings.delayMs,
      logger: createLogger(settings.logFile ? withConsole(fileLogCallback(settings.logFile)) : null),
    });
    if (result.failed.length) {
      deps.print(`Skipped ${result.failed.length} unavailable pages:`);
      for (const url of result.failed) deps.print(`  ${url}`);
    }
    deps.print(`Done in ${(result.durationMs / 1000).toFixed(1)}s. Saved to ${result.outputPath}`);
    return 0;
  } catch (error) {
    const stage = isCrawlError(error) ? ` during ${error.stage}` : "";
    deps.printError(`Download failed${stage}: ${(error as Error).message}`);
    return 1;
  }
}
