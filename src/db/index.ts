/**
 * Database module barrel exports
 */

export * from "./connection";
export * from "./migrate";
export * from "./repos/analysisRunsRepo";
export * from "./repos/documentScoresRepo";
export * from "./repos/algorithmStatsRepo";
