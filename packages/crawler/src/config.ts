import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { CrawlConfig, RemovalRule, SelectorType } from "./types.js";

export const selectorTypeSchema = z.enum(["class", "id", "tag"]);

const httpUrlSchema = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), "Expected an http(s) URL");

const crawlConfigInputSchema = z.object({
  baseUrl: httpUrlSchema,
  selectorType: selectorTypeSchema,
  selectorValue: z.string().trim().min(1),
  preRemoveType: selectorTypeSchema.nullish(),
  preRemoveValue: z.string().nullish(),
});

export type CrawlConfigInput = z.input<typeof crawlConfigInputSchema>;

/** External shape shared by the JSON config file and the HTTP request body. */
export const tutorialConfigSchema = z.object({
  type: selectorTypeSchema,
  value: z.string().trim().min(1),
  filename: z.string().trim().min(1).nullish(),
  pre_remove_type: selectorTypeSchema.nullish(),
  pre_remove_value: z.string().nullish(),
});

export type TutorialConfig = z.infer<typeof tutorialConfigSchema>;

export function splitRemovalValues(raw: string): string[] {
  return raw
    .split("|")
    .map((value) => value.trim())
    .filter(Boolean);
}

function buildRemovalRule(type?: SelectorType | null, raw?: string | null): RemovalRule | undefined {
  if (!type || !raw) return undefined;
  const values = splitRemovalValues(raw);
  if (!values.length) return undefined;
  return Object.freeze({ type, values: Object.freeze(values) });
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`).join("; ");
}

/**
 * Validates caller input once and returns a frozen config.
 * Pre-removal is only enabled when both its type and value are present.
 */
export function createCrawlConfig(input: CrawlConfigInput): CrawlConfig {
  const parsed = crawlConfigInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(`Invalid crawl config: ${describeIssues(parsed.error)}`);
  }

  const { baseUrl, selectorType, selectorValue, preRemoveType, preRemoveValue } = parsed.data;
  const preRemove = buildRemovalRule(preRemoveType, preRemoveValue);

  return Object.freeze({
    baseUrl,
    selector: Object.freeze({ type: selectorType, value: selectorValue }),
    ...(preRemove ? { preRemove } : {}),
  });
}

export function parseTutorialConfig(raw: unknown): TutorialConfig {
  const parsed = tutorialConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid tutorial config: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

interface PreRemoveOverrides {
  preRemoveType?: SelectorType | null;
  preRemoveValue?: string | null;
}

/** Each override field, when set, replaces the matching field of `config`. */
export function toCrawlConfig(url: string, config: TutorialConfig, overrides: PreRemoveOverrides = {}): CrawlConfig {
  return createCrawlConfig({
    baseUrl: url,
    selectorType: config.type,
    selectorValue: config.value,
    preRemoveType: overrides.preRemoveType || config.pre_remove_type,
    preRemoveValue: overrides.preRemoveValue || config.pre_remove_value,
  });
}
