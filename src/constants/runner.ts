/**
 * Runner entry point constants
 */

export const RUN_MODE_ENV = "RUN_MODE";
export const JOB_PROFILE_PATH_ENV = "JOB_PROFILE_PATH";
export const DOCUMENT_PATH_ENV = "DOCUMENT_PATH";
export const DOCUMENTS_DIR_ENV = "DOCUMENTS_DIR";
export const REPORT_PATH_ENV = "REPORT_PATH";

export const RUN_MODES = ["analyze", "batch"] as const;

/** Defaults used when the environment leaves a path unset */
export const DEFAULT_DOCUMENTS_DIR = "data/documents";
export const DEFAULT_REPORT_PATH = "data/batch_report.json";
