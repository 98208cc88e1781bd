import type { Result } from "@depmap/core";
import type { ScanError } from "../errors.js";
import type { Language, ScanDrafts } from "../model.js";

/**
 * Port for language scanners.
 *
 * A scan is pure: it sees one file's text and returns drafts without ids.
 * Cross-file resolution happens later, against the whole tree.
 */
export interface SourceScanner {
  readonly name: string;
  /** Extension including the dot, lower-case, mapped to the language it implies. */
  readonly extensions: Readonly<Record<string, Language>>;
  scan(path: string, content: string): Result<ScanDrafts, ScanError>;
}
