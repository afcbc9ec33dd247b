/**
 * File sampling types and their ArkType schemas
 *
 * Detection types live in `src/sniffer/types.ts`; this module covers what
 * the file layer adds on top.
 */

import { type } from "arktype";
import type { SniffOptions } from "./sniffer/types";

// =============================================================================
// FILE I/O TYPES
// =============================================================================

/**
 * Options for reading the head of a file
 */
export interface FileReaderOptions {
  /** Bytes read for detection (default: 1 MiB) */
  readonly maxBytes?: number;
  /** Chunk size for the underlying file stream in bytes (default: 64 KiB) */
  readonly bufferSize?: number;
}

/**
 * Head of a file as read for detection
 */
export interface FileSample {
  readonly path: string;
  readonly bytes: Uint8Array;
  /** Size of the whole file in bytes */
  readonly size: number;
  /** True when the file is longer than the sample */
  readonly truncated: boolean;
}

export interface SniffFileOptions extends SniffOptions, FileReaderOptions {}

// =============================================================================
// VALIDATION SCHEMAS
// =============================================================================

/**
 * File path validation schema
 *
 * Rejects empty paths and paths containing null characters, which the
 * operating system would refuse anyway with a less useful message.
 */
export const FilePathSchema = type("string>0").narrow((path, ctx) => {
  if (path.includes("\0")) {
    return ctx.reject({
      expected: "a path without null characters",
      actual: JSON.stringify(path),
    });
  }
  return true;
});

/**
 * File reader options validation schema
 */
export const FileReaderOptionsSchema = type({
  "maxBytes?": "number>0",
  "bufferSize?": "number>=1024", // Minimum 1KB buffer
}).narrow((options, ctx) => {
  if (options.maxBytes !== undefined && !Number.isInteger(options.maxBytes)) {
    return ctx.reject({
      path: ["maxBytes"],
      expected: "an integer byte count",
      actual: `${options.maxBytes}`,
    });
  }
  if (options.bufferSize !== undefined && !Number.isInteger(options.bufferSize)) {
    return ctx.reject({
      path: ["bufferSize"],
      expected: "an integer byte count",
      actual: `${options.bufferSize}`,
    });
  }
  return true;
});
