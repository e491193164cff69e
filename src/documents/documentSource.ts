/**
 * Plain-text document source
 *
 * Reads already-extracted text files from a directory. Binary formats
 * (PDF, DOCX) are converted upstream; this module only sees text.
 */

import * as fs from "fs";
import * as path from "path";
import type { SourceDocument } from "@/types";
import {
  COPY_MARKER_PATTERN,
  TEXT_DOCUMENT_EXTENSIONS,
} from "@/constants/documents";
import * as logger from "@/logger";

/**
 * Derives a document id from a file name.
 *
 * Steps: drop the extension, drop copy markers like "(2)", collapse
 * whitespace runs to "_", lower-case.
 *
 * @example
 * normalizeDocumentName("Jane Doe (1).txt") // "jane_doe"
 * normalizeDocumentName("CV  Final.md") // "cv_final"
 */
export function normalizeDocumentName(fileName: string): string {
  const base = path.parse(fileName).name;
  return base
    .replace(COPY_MARKER_PATTERN, "")
    .trim()
    .replace(/\s+/g, "_")
    .toLowerCase();
}

function isTextDocument(fileName: string): boolean {
  const extension = path.extname(fileName).toLowerCase();
  return TEXT_DOCUMENT_EXTENSIONS.includes(extension);
}

/**
 * Reads one file; a read failure becomes `text: null` so the batch can
 * skip the document instead of aborting.
 */
function readDocument(filePath: string): SourceDocument {
  const documentId = normalizeDocumentName(path.basename(filePath));
  try {
    return { documentId, filePath, text: fs.readFileSync(filePath, "utf-8") };
  } catch (err) {
    logger.warn("Failed to read document, continuing", {
      filePath,
      error: err instanceof Error ? err.message : String(err),
    });
    return { documentId, filePath, text: null };
  }
}

/**
 * Reads every text document in a directory (non-recursive).
 *
 * Documents are returned sorted by id. When two files normalize to the
 * same id, the first file name in sort order wins and the other is
 * logged and dropped.
 *
 * @throws {Error} If the directory cannot be listed
 */
export function readTextDocuments(dir: string): SourceDocument[] {
  const resolved = path.resolve(process.cwd(), dir);
  const fileNames = fs
    .readdirSync(resolved, { withFileTypes: true })
    .filter((entry) => entry.isFile() && isTextDocument(entry.name))
    .map((entry) => entry.name)
    .sort();

  const byId = new Map<string, SourceDocument>();
  for (const fileName of fileNames) {
    const document = readDocument(path.join(resolved, fileName));
    const existing = byId.get(document.documentId);
    if (existing) {
      logger.warn("Duplicate document id, keeping first file", {
        documentId: document.documentId,
        kept: path.basename(existing.filePath),
        dropped: fileName,
      });
      continue;
    }
    byId.set(document.documentId, document);
  }

  return [...byId.values()].sort((a, b) =>
    a.documentId < b.documentId ? -1 : a.documentId > b.documentId ? 1 : 0,
  );
}

/**
 * Reads a single document file.
 */
export function readTextDocument(filePath: string): SourceDocument {
  return readDocument(path.resolve(process.cwd(), filePath));
}
