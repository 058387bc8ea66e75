/**
 * File reading utilities
 *
 * Thin wrappers over the Effect platform FileSystem service, run against the
 * Node.js layer and surfaced as promises that reject with {@link FileError}.
 */

import { FileSystem } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { type } from "arktype";
import { Effect, Stream } from "effect";
import { FileError } from "../errors";
import type { FilePath, FileReaderOptions } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";

const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  bufferSize: 65536,
  encoding: "utf8",
  maxFileSize: 1_073_741_824, // 1GB
};

/**
 * Check if a path exists and is a regular file
 *
 * @throws {FileError} If path validation fails
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(NodeContext.layer)));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Get file size in bytes
 *
 * @throws {FileError} If the file cannot be accessed or doesn't exist
 */
export async function getSize(path: string): Promise<number> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs.stat(validatedPath);
    return Number(info.size);
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(NodeContext.layer)));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Open a file as a byte stream
 *
 * @throws {FileError} If the file is missing, too large or cannot be opened
 *
 * @example
 * ```typescript
 * const stream = await createStream("records.gb");
 * for await (const line of readLines(stream)) console.log(line);
 * ```
 */
export async function createStream(
  path: string,
  options: FileReaderOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  if (!(await exists(validatedPath))) {
    throw new FileError(
      "File does not exist or is not accessible",
      validatedPath,
      "open",
      undefined,
      "Check that the file path is correct and the file exists"
    );
  }
  await validateFileSize(validatedPath, mergedOptions);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const effectStream = fs.stream(validatedPath, { chunkSize: mergedOptions.bufferSize });
    return Stream.toReadableStream(effectStream);
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(NodeContext.layer)));
  } catch (error) {
    throw FileError.fromSystemError("open", validatedPath, error);
  }
}

/**
 * Read an entire file as text, subject to `maxFileSize`
 *
 * @throws {FileError} If the file cannot be read or is too large
 */
export async function readToString(path: string, options: FileReaderOptions = {}): Promise<string> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);
  await validateFileSize(validatedPath, mergedOptions);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.readFileString(validatedPath, mergedOptions.encoding);
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(NodeContext.layer)));
  } catch (error) {
    throw FileError.fromSystemError("read", validatedPath, error);
  }
}

async function validateFileSize(
  validatedPath: FilePath,
  mergedOptions: Required<FileReaderOptions>
): Promise<number> {
  const fileSize = await getSize(validatedPath);
  if (fileSize > mergedOptions.maxFileSize) {
    throw new FileError(
      `File too large: ${fileSize} bytes exceeds limit of ${mergedOptions.maxFileSize} bytes`,
      validatedPath,
      "read"
    );
  }
  return fileSize;
}

/**
 * Validate a file path and return the branded type
 */
function validatePath(path: string): FilePath {
  let validationResult: ReturnType<typeof FilePathSchema>;
  try {
    validationResult = FilePathSchema(path);
  } catch (error) {
    throw new FileError(
      `Invalid file path: ${error instanceof Error ? error.message : String(error)}`,
      path,
      "stat"
    );
  }
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}

function mergeOptions(options: FileReaderOptions): Required<FileReaderOptions> {
  const merged = {
    bufferSize: options.bufferSize ?? DEFAULT_OPTIONS.bufferSize,
    encoding: options.encoding ?? DEFAULT_OPTIONS.encoding,
    maxFileSize: options.maxFileSize ?? DEFAULT_OPTIONS.maxFileSize,
  };

  const validationResult = FileReaderOptionsSchema(merged);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${validationResult.summary}`, "", "read");
  }

  return merged;
}
