/**
 * Default configuration values for sectioning and splitting
 */

/** Target words per part used by the auto strategy when the caller gives none */
export const DEFAULT_AUTO_TARGET_WORDS = 1500;

/** Upper bound for slugs derived from part titles */
export const MAX_SLUG_LENGTH = 100;

/** Deepest heading level included in a generated table of contents */
export const DEFAULT_TOC_MAX_LEVEL = 3;

/** Zero-padded width of the part number in generated filenames */
export const DEFAULT_PART_FILENAME_WIDTH = 3;

/** Environment variable read by the CLI to pick the initial log level */
export const LOG_LEVEL_ENV = "DOCAST_LOG_LEVEL";
