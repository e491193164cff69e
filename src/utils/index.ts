/**
 * Utils barrel exports
 */

export * from "./text/textNormalization";
export * from "./profileValidation";
