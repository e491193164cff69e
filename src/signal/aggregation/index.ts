export * from "./rankDocuments";
export * from "./aggregateBatch";
