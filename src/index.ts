export * from "./ast/errors";
export * from "./ast/nodes";
export * from "./ast/NodeTransformer";
export * from "./ast/serialization";
export * from "./ast/text";
export * from "./ast/transforms";
export * from "./ast/traversal";
export * from "./ast/ValidationVisitor";
export * from "./ast/visitor";
export * from "./markdown/MarkdownReader";
export * from "./sections";
export * from "./splitter";
export * from "./config";
export { LogLevel, logger, parseLogLevel, setLogLevel } from "./utils/logger";
export { slugify } from "./utils/string";
