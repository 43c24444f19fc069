/**
 * Port for reading raw bytes from any origin (HTTP, local file).
 *
 * Sources stream; parsers that need the whole payload (parquet keeps its schema
 * in a footer) collect the chunks first.
 */
export interface DataSource {
  /** Yield the payload as a sequence of byte chunks. */
  read(): AsyncIterable<Buffer>;
}
