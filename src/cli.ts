/**
 * Command-line entry: `extract-paragraphs` and `make-passages`
 */

import { parseArgs } from "node:util";
import * as z from "zod";

import { DEFAULT_EXTRACT_OPTIONS, DEFAULT_MAX_PASSAGE_LENGTH, initializeConfig } from "./config.js";
import type { ExtractOptions, PassageOptions, PipelineConfig } from "./types.js";
import { createSentenceSplitter } from "./lib/parser/sentence-splitter.js";
import { parseTagKinds } from "./lib/parser/tags.js";
import { PipelineError, configError, errorToPayload, invalidInputError } from "./lib/utils/errors.js";
import { logger } from "./lib/utils/logger.js";
import { runExtractParagraphs } from "./stages/extract-paragraphs.js";
import { runMakePassages } from "./stages/make-passages.js";

export const USAGE = `Usage:
  wiki-passages extract-paragraphs --page-htmls-file <file> --output-file <file>
      [--tags-to-extract <tag>...] [--tags-to-remove <tag>...]
      [--inner-tags-to-remove <tag>...] [--sections-to-ignore <heading>...]
      [--min-paragraph-length <n>] [--max-paragraph-length <n>]
  wiki-passages make-passages --paragraphs-file <file> --output-file <file>
      [--max-passage-length <n>] [--sentence-locale <locale>]

List options may be repeated or given comma-separated.
Files ending in .gz are read and written gzip-compressed.
`;

const EXTRACT_ARGS = {
  "page-htmls-file": { type: "string" },
  "output-file": { type: "string" },
  "tags-to-extract": { type: "string", multiple: true },
  "tags-to-remove": { type: "string", multiple: true },
  "inner-tags-to-remove": { type: "string", multiple: true },
  "sections-to-ignore": { type: "string", multiple: true },
  "min-paragraph-length": { type: "string" },
  "max-paragraph-length": { type: "string" },
} as const;

const PASSAGE_ARGS = {
  "paragraphs-file": { type: "string" },
  "output-file": { type: "string" },
  "max-passage-length": { type: "string" },
  "sentence-locale": { type: "string" },
} as const;

const LengthSchema = z.coerce.number().int().nonnegative();
const BudgetSchema = z.coerce.number().int().positive();

function parseNumber(
  schema: z.ZodNumber,
  option: string,
  value: string | undefined,
  fallback: number
): number {
  if (value === undefined) {
    return fallback;
  }
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new PipelineError(
      invalidInputError(`--${option}`, value, result.error.issues[0]?.message)
    );
  }
  return result.data;
}

function requireOption(option: string, value: string | undefined): string {
  if (!value) {
    throw new PipelineError(invalidInputError(`--${option}`, value, "required"));
  }
  return value;
}

/**
 * Split repeated and comma-separated list values
 */
function listValues(values: string[] | undefined): string[] | undefined {
  return values?.flatMap((value) => value.split(",")).map((value) => value.trim()).filter(Boolean);
}

function parseCommandArgs<T>(args: string[], parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    throw new PipelineError(
      invalidInputError("arguments", args.join(" "), error instanceof Error ? error.message : String(error)),
      { cause: error }
    );
  }
}

/**
 * Build extract options from command-line values over the defaults
 */
export function buildExtractOptions(args: string[], config: PipelineConfig): {
  pageHtmlsFile: string;
  outputFile: string;
  options: ExtractOptions;
} {
  const values = parseCommandArgs(args, () => parseArgs({ args, options: EXTRACT_ARGS, strict: true }).values);
  const defaults = DEFAULT_EXTRACT_OPTIONS;

  const tagsToExtract = listValues(values["tags-to-extract"]);
  const tagsToRemove = listValues(values["tags-to-remove"]);
  const innerTagsToRemove = listValues(values["inner-tags-to-remove"]);
  const sectionsToIgnore = listValues(values["sections-to-ignore"]);

  const options: ExtractOptions = {
    tagsToExtract: tagsToExtract ? parseTagKinds(tagsToExtract, "tags-to-extract") : defaults.tagsToExtract,
    tagsToRemove: tagsToRemove ? parseTagKinds(tagsToRemove, "tags-to-remove") : defaults.tagsToRemove,
    innerTagsToRemove: innerTagsToRemove
      ? parseTagKinds(innerTagsToRemove, "inner-tags-to-remove")
      : defaults.innerTagsToRemove,
    sectionsToIgnore: sectionsToIgnore ? new Set(sectionsToIgnore) : defaults.sectionsToIgnore,
    minParagraphLength: parseNumber(
      LengthSchema,
      "min-paragraph-length",
      values["min-paragraph-length"],
      defaults.minParagraphLength
    ),
    maxParagraphLength: parseNumber(
      LengthSchema,
      "max-paragraph-length",
      values["max-paragraph-length"],
      defaults.maxParagraphLength
    ),
    unicodeForm: config.unicodeForm,
  };

  if (options.minParagraphLength > options.maxParagraphLength) {
    throw new PipelineError(
      invalidInputError(
        "--min-paragraph-length",
        options.minParagraphLength,
        `greater than --max-paragraph-length ${options.maxParagraphLength}`
      )
    );
  }

  return {
    pageHtmlsFile: requireOption("page-htmls-file", values["page-htmls-file"]),
    outputFile: requireOption("output-file", values["output-file"]),
    options,
  };
}

/**
 * Build passage options from command-line values over the defaults
 */
export function buildPassageOptions(args: string[], config: PipelineConfig): {
  paragraphsFile: string;
  outputFile: string;
  options: PassageOptions;
} {
  const values = parseCommandArgs(args, () => parseArgs({ args, options: PASSAGE_ARGS, strict: true }).values);
  const locale = values["sentence-locale"] ?? config.sentenceLocale;

  let splitter: PassageOptions["splitter"];
  try {
    splitter = createSentenceSplitter(locale);
  } catch (error) {
    throw new PipelineError(
      invalidInputError("--sentence-locale", locale, error instanceof Error ? error.message : String(error)),
      { cause: error }
    );
  }

  return {
    paragraphsFile: requireOption("paragraphs-file", values["paragraphs-file"]),
    outputFile: requireOption("output-file", values["output-file"]),
    options: {
      maxPassageLength: parseNumber(
        BudgetSchema,
        "max-passage-length",
        values["max-passage-length"],
        DEFAULT_MAX_PASSAGE_LENGTH
      ),
      splitter,
    },
  };
}

function loadPipelineConfig(env: NodeJS.ProcessEnv): PipelineConfig {
  try {
    return initializeConfig(env);
  } catch (error) {
    throw new PipelineError(configError(error instanceof Error ? error.message : String(error)), {
      cause: error,
    });
  }
}

/**
 * Run the command line; resolves to the process exit code
 */
export async function runCli(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  const [command, ...args] = argv;

  if (command === undefined || command === "--help" || command === "-h" || command === "help") {
    process.stdout.write(USAGE);
    return command === undefined ? 1 : 0;
  }

  try {
    const config = loadPipelineConfig(env);

    switch (command) {
      case "extract-paragraphs":
        await runExtractParagraphs(buildExtractOptions(args, config));
        return 0;
      case "make-passages":
        await runMakePassages(buildPassageOptions(args, config));
        return 0;
      default:
        throw new PipelineError(invalidInputError("command", command, "expected extract-paragraphs or make-passages"));
    }
  } catch (error) {
    const payload = errorToPayload(error);
    logger.error(payload.message, { code: payload.code, details: payload.details });
    return 1;
  }
}
