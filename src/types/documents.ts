/**
 * Document type definitions
 *
 * Documents arrive as already-extracted text. A null text marks an
 * extraction failure upstream.
 */

export type DocumentInput = {
  /** Stable identifier, also the ranking tie-breaker */
  documentId: string;
  /** Extracted text, or null when extraction failed */
  text: string | null;
};

/**
 * Document read from disk by the document source.
 */
export type SourceDocument = DocumentInput & {
  /** Absolute path of the file the text came from */
  filePath: string;
};
