export * from "./analyzeDocument";
