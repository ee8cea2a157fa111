import fs from "node:fs/promises";
import path from "node:path";
import { Command, InvalidArgumentError, Option } from "commander";
import { countWords } from "../ast/text";
import { toJson } from "../ast/serialization";
import { validateDocument } from "../ast/ValidationVisitor";
import { querySections, headingText } from "../sections/query";
import { generateToc, type TocStyle } from "../sections/toc";
import { formatPartFilename, splitDocument } from "../splitter/splitDocument";
import { LogLevel, logger, setLogLevel } from "../utils/logger";
import { loadDocument } from "./loadDocument";

/**
 * Where commands write their results. Diagnostics go through the logger.
 */
export interface CliOutput {
  write(text: string): void;
  /** Set by commands that finish with findings rather than an error */
  exitCode: number;
}

interface GlobalOptions {
  verbose: boolean;
  silent: boolean;
}

interface SplitCommandOptions {
  by: string;
  out?: string;
  target?: number;
  preamble: boolean;
}

interface SectionsCommandOptions {
  level?: number;
}

interface TocCommandOptions {
  maxLevel: number;
  style: TocStyle;
}

interface ValidateCommandOptions {
  strict: boolean;
}

const formatOutput = (data: unknown) => JSON.stringify(data, null, 2);

const parseInteger = (min: number, max = Number.MAX_SAFE_INTEGER) => {
  return (value: string): number => {
    const parsed = /^\d+$/.test(value.trim()) ? Number.parseInt(value, 10) : Number.NaN;
    if (Number.isNaN(parsed) || parsed < min || parsed > max) {
      throw new InvalidArgumentError(
        max === Number.MAX_SAFE_INTEGER ? `Expected an integer >= ${min}.` : `Expected an integer between ${min} and ${max}.`,
      );
    }
    return parsed;
  };
};

/**
 * Builds the `docast` command tree. Results are written to `output`.
 */
export function createProgram(version: string, output: CliOutput): Command {
  const program = new Command();

  program
    .name("docast")
    .description("Inspect, validate and split structured documents")
    .version(version)
    // Add global options for logging level
    .option("--verbose", "Enable verbose (debug) logging", false)
    .option("--silent", "Disable all logging except errors", false);

  program
    .command("split <file>")
    .description(
      "Split a Markdown or JSON document into parts. Specifications:\n" +
        "  - h1..h6          one part per heading at that level or above\n" +
        "  - length=<words>  pack whole sections into parts of about <words> words\n" +
        "  - parts=<count>   aim for <count> parts of similar length\n" +
        "  - delimiter=<text> split on paragraphs consisting of <text>\n" +
        "  - break           split on thematic breaks\n" +
        "  - auto            pick a strategy from the document's headings",
    )
    .requiredOption("-b, --by <spec>", "Split specification")
    .option("-o, --out <dir>", "Write each part as JSON into this directory")
    .option("-t, --target <words>", "Target words per part for 'auto'", parseInteger(1))
    .option("--no-preamble", "Drop content before the first heading (heading splits)")
    .action(async (file: string, options: SplitCommandOptions) => {
      const doc = await loadDocument(file);
      const parts = splitDocument(doc, options.by, {
        includePreamble: options.preamble,
        targetWords: options.target,
      });

      const files: Array<string | undefined> = [];
      if (options.out) {
        await fs.mkdir(options.out, { recursive: true });
        for (const part of parts) {
          const name = formatPartFilename(part, { extension: "json" });
          await fs.writeFile(path.join(options.out, name), `${toJson(part.document, 2)}\n`, "utf-8");
          files.push(name);
        }
        logger.info(`✅ Wrote ${parts.length} parts to ${options.out}`);
      }

      output.write(
        formatOutput(
          parts.map((part, i) => ({
            index: part.index,
            title: part.title,
            wordCount: part.wordCount,
            ...(Object.keys(part.metadata).length > 0 ? { metadata: part.metadata } : {}),
            ...(files[i] ? { file: files[i] } : {}),
          })),
        ),
      );
    });

  program
    .command("sections <file>")
    .description("List the sections of a document")
    .option("-l, --level <level>", "Only sections at this heading level", parseInteger(1, 6))
    .action(async (file: string, options: SectionsCommandOptions) => {
      const doc = await loadDocument(file);
      const sections = querySections(doc, undefined, { level: options.level });
      output.write(
        formatOutput(
          sections.map((section, index) => ({
            index,
            level: section.level,
            title: headingText(section),
            startIndex: section.startIndex,
            endIndex: section.endIndex,
            wordCount: countWords(section.content),
          })),
        ),
      );
    });

  program
    .command("toc <file>")
    .description("Print a table of contents")
    .option("-m, --max-level <level>", "Deepest heading level to include", parseInteger(1, 6), 3)
    .addOption(
      new Option("-s, --style <style>", "Output style").choices(["markdown", "list", "nested"]).default("markdown"),
    )
    .action(async (file: string, options: TocCommandOptions) => {
      const doc = await loadDocument(file);
      const toc = generateToc(doc, { maxLevel: options.maxLevel, style: options.style });
      output.write(typeof toc === "string" ? toc : toJson(toc, 2));
    });

  program
    .command("validate <file>")
    .description("Report structural problems; exits with code 1 when there are any")
    .option("--strict", "Stop at the first problem", false)
    .action(async (file: string, options: ValidateCommandOptions) => {
      const doc = await loadDocument(file);
      const { findings } = validateDocument(doc, { strict: options.strict });
      if (findings.length === 0) {
        logger.info(`✅ ${file} is valid`);
        return;
      }
      for (const finding of findings) {
        output.write(finding);
      }
      logger.warn(`⚠️ ${findings.length} problem(s) found in ${file}`);
      output.exitCode = 1;
    });

  program
    .command("convert <file>")
    .description("Print a Markdown document as docast JSON")
    .action(async (file: string) => {
      const doc = await loadDocument(file);
      output.write(toJson(doc, 2));
    });

  // Hook to set log level after parsing global options but before executing command action
  program.hook("preAction", (thisCommand) => {
    const options = thisCommand.opts<GlobalOptions>();
    if (options.silent) {
      // If silent is true, it overrides verbose
      setLogLevel(LogLevel.ERROR);
    } else if (options.verbose) {
      setLogLevel(LogLevel.DEBUG);
    }
  });

  return program;
}
