/**
 * Document source constants
 */

/** File extensions read as plain-text documents */
export const TEXT_DOCUMENT_EXTENSIONS: readonly string[] = [".txt", ".md"];

/** Copy markers such as "resume (2).txt" */
export const COPY_MARKER_PATTERN = /\(\d+\)/g;
