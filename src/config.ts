/**
 * Configuration module for reading and validating environment variables
 */

import type { ExtractOptions, PipelineConfig, TagKind, UnicodeForm } from "./types.js";

/**
 * Default configuration values
 */
const DEFAULT_CONFIG: PipelineConfig = {
  logLevel: "info",
  sentenceLocale: "ja",
  unicodeForm: "NFC",
};

/**
 * Valid log levels
 */
const VALID_LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

const VALID_UNICODE_FORMS = ["NFC", "NFKC"] as const;

/**
 * Headings whose sections carry citations and navigation rather than prose
 */
export const DEFAULT_SECTIONS_TO_IGNORE: readonly string[] = [
  "脚注",
  "出典",
  "参考文献",
  "関連項目",
  "外部リンク",
  "Notes",
  "References",
  "See also",
  "External links",
  "Further reading",
];

/**
 * Defaults of the extract stage (overridable from the command line)
 */
export const DEFAULT_EXTRACT_OPTIONS: ExtractOptions = {
  tagsToExtract: new Set<TagKind>(["p", "h3", "h4", "h5", "h6", "dt", "dd", "li", "th", "tr"]),
  tagsToRemove: new Set<TagKind>(["table"]),
  innerTagsToRemove: new Set<TagKind>(["sup"]),
  sectionsToIgnore: new Set(DEFAULT_SECTIONS_TO_IGNORE),
  minParagraphLength: 10,
  maxParagraphLength: 1000,
  unicodeForm: DEFAULT_CONFIG.unicodeForm,
};

export const DEFAULT_MAX_PASSAGE_LENGTH = 750;

function isLogLevel(value: string): value is PipelineConfig["logLevel"] {
  return (VALID_LOG_LEVELS as readonly string[]).includes(value);
}

function isUnicodeForm(value: string): value is UnicodeForm {
  return (VALID_UNICODE_FORMS as readonly string[]).includes(value);
}

/**
 * Check that the runtime can segment sentences for a locale tag
 */
function isValidLocale(locale: string): boolean {
  try {
    new Intl.Segmenter(locale, { granularity: "sentence" });
    return true;
  } catch {
    return false;
  }
}

/**
 * Read and validate configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const logLevel = env.LOG_LEVEL ?? DEFAULT_CONFIG.logLevel;
  const sentenceLocale = env.PASSAGES_SENTENCE_LOCALE ?? DEFAULT_CONFIG.sentenceLocale;
  const unicodeForm = env.PASSAGES_UNICODE_FORM ?? DEFAULT_CONFIG.unicodeForm;

  if (!isLogLevel(logLevel)) {
    throw new Error(
      `Invalid LOG_LEVEL: ${logLevel}. Must be one of: ${VALID_LOG_LEVELS.join(", ")}`
    );
  }

  if (!isUnicodeForm(unicodeForm)) {
    throw new Error(
      `Invalid PASSAGES_UNICODE_FORM: ${unicodeForm}. Must be one of: ${VALID_UNICODE_FORMS.join(", ")}`
    );
  }

  if (!isValidLocale(sentenceLocale)) {
    throw new Error(`Invalid PASSAGES_SENTENCE_LOCALE: ${sentenceLocale}`);
  }

  return {
    logLevel,
    sentenceLocale,
    unicodeForm,
  };
}

let cachedConfig: PipelineConfig | null = null;

/**
 * Set cached config directly (for testing only)
 * @internal
 */
export function _setCachedConfigForTesting(config: PipelineConfig | null): void {
  cachedConfig = config;
}

/**
 * Get the pipeline configuration. Throws until initializeConfig() has run.
 */
export function getConfig(): PipelineConfig {
  if (!cachedConfig) {
    throw new Error("Configuration not loaded. Call initializeConfig() first.");
  }
  return cachedConfig;
}

/**
 * Load and cache configuration
 */
export function initializeConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig(env);
  }
  return cachedConfig;
}

/**
 * Reset the cached configuration.
 * The logger reads config lazily, so it picks up the next loaded config after resetLevel().
 */
export function resetConfig(): void {
  cachedConfig = null;
}
