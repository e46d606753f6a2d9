/**
 * Text Source
 *
 * The page-text capability the converter consumes. Implementations decode
 * a document however they like; the converter only needs page count and
 * per-page lines in top-to-bottom reading order.
 */

export interface TextDocument {
  readonly totalPages: number;

  /**
   * Lines of one page, 1-based. May reject for a single bad page without
   * invalidating the rest of the document.
   */
  getPageLines(pageNumber: number): Promise<string[]>;

  /** Release the underlying handle. Safe to call once per opened document. */
  close(): Promise<void>;
}

export interface TextSource {
  /**
   * Open a document for reading.
   *
   * @throws when the file is unreadable or not a decodable document
   */
  open(filePath: string): Promise<TextDocument>;
}

