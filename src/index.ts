/**
 * tabsniff - dialect detection for delimited text
 *
 * Works out the delimiter, quote and escape character of CSV-like data by
 * scoring how table-like each candidate parse is, so messy real-world
 * exports can be read without guessing.
 */

// Error types
export {
  CompressionError,
  type DetectionFailure,
  DetectionTimedOutError,
  ERROR_SUGGESTIONS,
  FileError,
  getErrorSuggestion,
  InvalidInputError,
  NoDialectFoundError,
  type NoDialectReason,
  SniffError,
  ValidationError,
} from "./errors";
// File sampling
export { readSample, sniffFile } from "./io/file-reader";
// Dialect detection
export * from "./sniffer";
// File types
export type { FileReaderOptions, FileSample, SniffFileOptions } from "./types";
export { FilePathSchema, FileReaderOptionsSchema } from "./types";
