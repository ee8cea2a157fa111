export * from "./errors";
export { parseSplitSpec } from "./parseSplitSpec";
export { PREAMBLE_TITLE, partitionByLevel, type HeadingRun, type Partition } from "./partition";
export * from "./splitDocument";
export { AutoSplitter, type AutoStrategy } from "./splitters/AutoSplitter";
export { BreakSplitter, DelimiterSplitter } from "./splitters/DelimiterSplitter";
export { HeadingSplitter, SectionSplitter } from "./splitters/HeadingSplitter";
export { PartsSplitter } from "./splitters/PartsSplitter";
export { WordCountSplitter } from "./splitters/WordCountSplitter";
export { SplitResult, type DocumentSplitter, type SplitSpec, type SplitStrategy } from "./types";
