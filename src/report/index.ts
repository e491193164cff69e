export * from "./batchReport";
export * from "./analysisReport";
