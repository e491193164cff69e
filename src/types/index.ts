export * from "./logger";
export * from "./matching";
export * from "./scoring";
export * from "./jobProfile";
export * from "./documents";
export * from "./batch";
export * from "./report";
export * from "./db";
