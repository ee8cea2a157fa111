export * from "./editing";
export * from "./errors";
export * from "./query";
export * from "./toc";
export type * from "./types";
