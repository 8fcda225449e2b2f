import { parseArgs } from "node:util";
import { ConfigError, selectorTypeSchema, type SelectorType } from "@tutorial-md/crawler";

export const DEFAULT_OUTPUT_FILENAME = "tutorial.md";
export const DEFAULT_DELAY_SECONDS = 1;

export type CliArgs = {
  url: string;
  type: SelectorType;
  value: string | null;
  configPath: string | null;
  filename: string;
  delaySeconds: number;
  preRemoveType: SelectorType | null;
  preRemoveValue: string | null;
  outputRoot: string | null;
  logFile: string | null;
  help: boolean;
};

export const USAGE = `Usage: tutorial-md <url> [options]

Options:
  --type <class|id|tag>        Link container selector type (default: class)
  --value <value>              Link container selector value
  --config <file.json>         JSON file with type, value and optional filename / pre_remove_*
  --filename <name>            Output file name (default: ${DEFAULT_OUTPUT_FILENAME}); a config filename wins
  --delay <seconds>            Pause between requests (default: ${DEFAULT_DELAY_SECONDS})
  --pre-remove-type <type>     Selector type of elements removed from every page
  --pre-remove-value <values>  Values to remove, separated by "|"
  --output-root <dir>          Directory for documents and the HTML cache (default: downloads)
  --log-file <path>            Append log records to a file instead of the console
  -h, --help                   Show this message

Examples:
  tutorial-md https://example.com/tutorial --type class --value urlList
  tutorial-md https://example.com/tutorial --config config.json`;

function optionalString(value: string | boolean | undefined): string | null {
  return typeof value === "string" && value.trim() ? value.trim() : null;
}

function parseSelectorType(flag: string, value: string | null): SelectorType | null {
  if (value === null) return null;
  const parsed = selectorTypeSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(`${flag} must be one of class, id, tag (got "${value}")`);
  }
  return parsed.data;
}

function parseDelay(value: string | null): number {
  if (value === null) return DEFAULT_DELAY_SECONDS;
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new ConfigError(`--delay must be a non-negative number of seconds (got "${value}")`);
  }
  return seconds;
}

export function parseCliArgs(args: string[]): CliArgs {
  const parsed = parseArgs({
    args,
    allowPositionals: true,
    options: {
      type: { type: "string" },
      value: { type: "string" },
      config: { type: "string" },
      filename: { type: "string" },
      delay: { type: "string" },
      "pre-remove-type": { type: "string" },
      "pre-remove-value": { type: "string" },
      "output-root": { type: "string" },
      "log-file": { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });

  const help = Boolean(parsed.values.help);
  const url = parsed.positionals[0]?.trim() ?? "";
  if (!url && !help) throw new ConfigError("A tutorial URL is required");
  if (parsed.positionals.length > 1) {
    throw new ConfigError(`Unexpected arguments: ${parsed.positionals.slice(1).join(" ")}`);
  }

  return {
    url,
    type: parseSelectorType("--type", optionalString(parsed.values.type)) ?? "class",
    value: optionalString(parsed.values.value),
    configPath: optionalString(parsed.values.config),
    filename: optionalString(parsed.values.filename) ?? DEFAULT_OUTPUT_FILENAME,
    delaySeconds: parseDelay(optionalString(parsed.values.delay)),
    preRemoveType: parseSelectorType("--pre-remove-type", optionalString(parsed.values["pre-remove-type"])),
    preRemoveValue: optionalString(parsed.values["pre-remove-value"]),
    outputRoot: optionalString(parsed.values["output-root"]),
    logFile: optionalString(parsed.values["log-file"]),
    help,
  };
}
