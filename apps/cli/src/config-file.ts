import fs from "fs-extra";
import { ConfigError, parseTutorialConfig, type TutorialConfig } from "@tutorial-md/crawler";

/** Reads and validates a JSON tutorial config (`type`, `value`, optional `filename` and `pre_remove_*`). */
export async function loadTutorialConfig(configPath: string): Promise<TutorialConfig> {
  let raw: unknown;
  try {
    raw = await fs.readJson(configPath, { encoding: "utf8" });
  } catch (error) {
    throw new ConfigError(`Failed to load config file ${configPath}: ${(error as Error).message}`, { cause: error });
  }
  return parseTutorialConfig(raw);
}
