import { MAX_SLUG_LENGTH } from "../config";

/**
 * Thoroughly removes all types of whitespace characters from both ends of a string.
 * Handles spaces, tabs, line breaks, and carriage returns.
 */
export const fullTrim = (str: string): string => {
  return str.replace(/^[\s\r\n\t]+|[\s\r\n\t]+$/g, "");
};

/**
 * Splits text on runs of whitespace and counts the non-empty pieces.
 */
export const countWordsInText = (text: string): number => {
  const trimmed = fullTrim(text);
  return trimmed ? trimmed.split(/\s+/).length : 0;
};

/**
 * Converts a title into a filesystem-safe slug restricted to `[a-z0-9-]`.
 *
 * Diacritics are folded to their base letters, everything outside letters,
 * digits, spaces and hyphens is dropped, and runs of whitespace, underscores
 * or hyphens collapse into a single hyphen. The result never starts or ends
 * with a hyphen and is at most `maxLength` characters long.
 */
export const slugify = (text: string, maxLength: number = MAX_SLUG_LENGTH): string => {
  let slug = text
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9\s_-]/g, "")
    .replace(/[\s_-]+/g, "-")
    .replace(/^-+|-+$/g, "");

  if (slug.length > maxLength) {
    slug = slug.slice(0, maxLength).replace(/-+$/g, "");
  }
  return slug;
};

/**
 * Produces a GitHub-style heading anchor, suffixing `-1`, `-2`, ... when the
 * same anchor was already handed out. `seen` is updated in place.
 */
export const uniqueAnchor = (text: string, seen: Set<string>): string => {
  const base = slugify(text) || "section";
  let anchor = base;
  let counter = 1;
  while (seen.has(anchor)) {
    anchor = `${base}-${counter}`;
    counter++;
  }
  seen.add(anchor);
  return anchor;
};

/**
 * Decodes backslash escape sequences (`\n`, `\t`, `\r`, `\\`, `\xHH`,
 * `\uHHHH`) in a literal typed on a command line. Unknown escapes are kept
 * as written.
 */
export const decodeEscapes = (value: string): string => {
  return value.replace(
    /\\(u[0-9a-fA-F]{4}|x[0-9a-fA-F]{2}|[ntr0\\"'])/g,
    (match: string, sequence: string) => {
      switch (sequence[0]) {
        case "n":
          return "\n";
        case "t":
          return "\t";
        case "r":
          return "\r";
        case "0":
          return "\0";
        case "\\":
          return "\\";
        case '"':
          return '"';
        case "'":
          return "'";
        case "u":
        case "x":
          return String.fromCharCode(Number.parseInt(sequence.slice(1), 16));
        default:
          return match;
      }
    },
  );
};
