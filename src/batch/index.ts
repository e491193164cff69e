export * from "./runLifecycle";
export * from "./runDocumentBatch";
