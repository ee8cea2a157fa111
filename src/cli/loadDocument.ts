import fs from "node:fs/promises";
import path from "node:path";
import type { Document } from "../ast/nodes";
import { documentFromRecord } from "../ast/serialization";
import { SerializationError } from "../ast/errors";
import { parseMarkdown } from "../markdown/MarkdownReader";
import { logger } from "../utils/logger";

const MARKDOWN_EXTENSIONS = new Set([".md", ".markdown"]);

/**
 * Reads a Markdown file or a serialized document (`.json`) from disk.
 */
export async function loadDocument(file: string): Promise<Document> {
  const extension = path.extname(file).toLowerCase();
  const source = await fs.readFile(file, "utf-8");

  if (MARKDOWN_EXTENSIONS.has(extension)) {
    logger.debug(`Parsing Markdown from ${file}`);
    return parseMarkdown(source, { metadata: { source: path.basename(file) } });
  }
  if (extension === ".json") {
    logger.debug(`Reading serialized document from ${file}`);
    let data: unknown;
    try {
      data = JSON.parse(source);
    } catch (error) {
      throw new SerializationError(
        `Invalid JSON in ${file}: ${error instanceof Error ? error.message : String(error)}`,
        "",
        error instanceof Error ? error : undefined,
      );
    }
    return documentFromRecord(data);
  }
  throw new Error(`Unsupported input file '${file}': expected .md, .markdown or .json`);
}
