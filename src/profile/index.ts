export * from "./classifyKeywords";
export * from "./loader";
