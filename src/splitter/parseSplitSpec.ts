import { decodeEscapes, fullTrim } from "../utils/string";
import { SplitSpecError } from "./errors";
import type { SplitSpec } from "./types";

const KEYWORDS = ["auto", "break", "page", "chapter"] as const;
type Keyword = (typeof KEYWORDS)[number];

const isKeyword = (value: string): value is Keyword => KEYWORDS.some((keyword) => keyword === value);

function parsePositiveInteger(key: string, value: string, token: string): number {
  const parsed = /^[+-]?\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
  if (!Number.isSafeInteger(parsed) || parsed < 1) {
    throw new SplitSpecError(`Invalid ${key} value '${value}' in '${token}': must be a positive integer`, token);
  }
  return parsed;
}

/**
 * Parses a split specification.
 *
 * Accepted forms, case-insensitive and ignoring surrounding whitespace:
 * `h1`-`h6`, `length=<words>`, `parts=<count>`, `delimiter=<text>` (with
 * backslash escapes such as `\n` decoded), and the keywords `auto`,
 * `break`, `page` and `chapter`.
 *
 * @throws SplitSpecError naming the rejected token
 */
export function parseSplitSpec(spec: string): SplitSpec {
  const token = spec.trim();
  if (!token) {
    throw new SplitSpecError("Split specification is empty", token);
  }

  const heading = /^h(\d+)$/i.exec(token);
  if (heading) {
    const level = Number.parseInt(heading[1], 10);
    if (level < 1 || level > 6) {
      throw new SplitSpecError(`Invalid heading level in '${token}': level must be between 1 and 6, got ${level}`, token);
    }
    return { strategy: "heading", level };
  }

  const equals = token.indexOf("=");
  if (equals !== -1) {
    const key = token.slice(0, equals).trim().toLowerCase();
    const value = token.slice(equals + 1).trim();
    switch (key) {
      case "length":
        return { strategy: "length", words: parsePositiveInteger(key, value, token) };
      case "parts":
        return { strategy: "parts", parts: parsePositiveInteger(key, value, token) };
      case "delimiter": {
        if (!value) {
          throw new SplitSpecError(`Delimiter value cannot be empty in '${token}'`, token);
        }
        const delimiter = decodeEscapes(value);
        if (!fullTrim(delimiter)) {
          throw new SplitSpecError(`Delimiter value in '${token}' is only whitespace once decoded`, token);
        }
        return { strategy: "delimiter", delimiter };
      }
      default:
        throw new SplitSpecError(
          `Unknown split strategy '${key}' in '${token}'. Expected length, parts or delimiter`,
          key,
        );
    }
  }

  const keyword = token.toLowerCase();
  if (isKeyword(keyword)) {
    return { strategy: keyword };
  }

  throw new SplitSpecError(
    `Invalid split specification '${token}'. Expected: h1-h6, length=N, parts=N, delimiter=TEXT, break, page, chapter, or auto`,
    token,
  );
}
