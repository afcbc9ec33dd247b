/**
 * File sampling for dialect detection
 *
 * Reads the head of a file through the @effect/platform FileSystem service
 * and runs detection on it. Only the first `maxBytes` are ever read, so the
 * cost of sniffing does not grow with the file.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Chunk, Effect, Either, Stream } from "effect";
import { FileError } from "../errors";
import { MAX_DETECTION_BYTES } from "../sniffer/constants";
import { defaultOnWarning } from "../sniffer/detection";
import { decodeInput, sniff } from "../sniffer/sniff";
import type { SniffResult } from "../sniffer/types";
import { concatBytes } from "../sniffer/utils";
import type { FileReaderOptions, FileSample, SniffFileOptions } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";
import { getPlatform } from "./runtime";

// Module-level constants for default options
const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  maxBytes: MAX_DETECTION_BYTES,
  bufferSize: 65536,
};

/**
 * Read the head of a file
 *
 * @param path File path to read
 * @param options Byte cap and stream chunk size
 * @returns Promise resolving to the sampled bytes, the full file size and
 * whether the sample is shorter than the file
 * @throws {FileError} If the path is invalid, is not a regular file, or
 * cannot be read
 *
 * @example
 * ```typescript
 * const sample = await readSample("orders.csv", { maxBytes: 64 * 1024 });
 * if (sample.truncated) console.log(`sampled ${sample.bytes.length} of ${sample.size} bytes`);
 * ```
 */
export async function readSample(path: string, options: FileReaderOptions = {}): Promise<FileSample> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    const info = yield* fs
      .stat(validatedPath)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("stat", validatedPath, error)));
    if (info.type !== "File") {
      return yield* Effect.fail(
        new FileError(
          `Path is not a regular file (found ${info.type})`,
          validatedPath,
          "stat",
          undefined,
          "Path points to a directory or special file, not a file"
        )
      );
    }

    const chunks = yield* fs
      .stream(validatedPath, {
        bytesToRead: mergedOptions.maxBytes,
        chunkSize: mergedOptions.bufferSize,
      })
      .pipe(
        Stream.runCollect,
        Effect.mapError((error) => FileError.fromSystemError("read", validatedPath, error))
      );

    const size = Number(info.size);
    return {
      path: validatedPath,
      bytes: concatBytes(Chunk.toReadonlyArray(chunks)),
      size,
      truncated: size > mergedOptions.maxBytes,
    };
  });

  const result = await Effect.runPromise(
    program.pipe(Effect.either, Effect.provide(getPlatform()))
  );
  if (Either.isLeft(result)) {
    throw result.left;
  }
  return result.right;
}

/**
 * Detect the dialect of a file from its head
 *
 * When the file is longer than `maxBytes`, the last (possibly cut) line of
 * the sample is dropped before detection and a warning is reported.
 *
 * @param path File path to sniff
 * @param options Detection options plus the byte cap
 * @returns Promise resolving to the sniff result for the sample
 * @throws {FileError} If the file cannot be read
 * @throws {NoDialectFoundError} If no plausible dialect was found
 *
 * @example
 * ```typescript
 * const { dialect, hasHeader } = await sniffFile("export.tsv.gz");
 * ```
 */
export async function sniffFile(path: string, options: SniffFileOptions = {}): Promise<SniffResult> {
  const { maxBytes, bufferSize, ...sniffOptions } = options;
  const sample = await readSample(path, { maxBytes, bufferSize });

  if (sample.truncated) {
    const onWarning = sniffOptions.onWarning ?? defaultOnWarning;
    onWarning(
      `${sample.path} is ${sample.size} bytes; detecting from the first ${sample.bytes.length}`
    );
  }

  const text = decodeInput(sample.bytes, { truncated: sample.truncated });
  return sniff(text, sniffOptions);
}

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

/**
 * Validate file path using ArkType
 * Maintains FileError interface contract for callers
 */
function validatePath(path: string): string {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}

/**
 * Merge user options with defaults
 */
function mergeOptions(options: FileReaderOptions): Required<FileReaderOptions> {
  const merged = {
    maxBytes: options.maxBytes ?? DEFAULT_OPTIONS.maxBytes,
    bufferSize: options.bufferSize ?? DEFAULT_OPTIONS.bufferSize,
  };

  const validationResult = FileReaderOptionsSchema(merged);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${validationResult.summary}`, "", "read");
  }

  return merged;
}
