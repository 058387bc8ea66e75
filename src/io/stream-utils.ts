/**
 * Line splitting over byte streams
 *
 * Decodes a `ReadableStream<Uint8Array>` incrementally and yields lines
 * without their terminators, handling `\n` and `\r\n` endings and chunk
 * boundaries that fall inside a line or a multi-byte character.
 */

import { StreamError } from "../errors";

const DEFAULT_MAX_LINE_LENGTH = 1_000_000;

/**
 * Result of splitting a decoded buffer into lines
 */
export interface LineProcessingResult {
  /** Complete lines, terminators removed */
  readonly lines: string[];
  /** Trailing text with no terminator yet */
  readonly remainder: string;
}

/**
 * Extract complete lines from a text buffer
 *
 * @throws {StreamError} If a complete line exceeds `maxLineLength`
 */
export function processBuffer(
  buffer: string,
  maxLineLength = DEFAULT_MAX_LINE_LENGTH
): LineProcessingResult {
  const lines: string[] = [];
  let lineStart = 0;
  let newline = buffer.indexOf("\n", lineStart);

  while (newline !== -1) {
    const lineEnd = newline > lineStart && buffer.charAt(newline - 1) === "\r" ? newline - 1 : newline;
    const line = buffer.slice(lineStart, lineEnd);
    if (line.length > maxLineLength) {
      throw new StreamError(
        `Line too long: ${line.length} characters exceeds maximum ${maxLineLength}`,
        "read",
        undefined,
        `Line starts with: ${line.slice(0, 100)}...`
      );
    }
    lines.push(line);
    lineStart = newline + 1;
    newline = buffer.indexOf("\n", lineStart);
  }

  return { lines, remainder: buffer.slice(lineStart) };
}

/**
 * Read lines from a byte stream
 *
 * Blank lines are yielded so callers can count lines; a final line without
 * a terminator is yielded when it is not blank.
 *
 * @example
 * ```typescript
 * for await (const line of readLines(stream)) {
 *   if (line.startsWith("LOCUS")) console.log(line);
 * }
 * ```
 */
export async function* readLines(
  stream: ReadableStream<Uint8Array>,
  encoding: "utf8" | "latin1" = "utf8",
  maxLineLength = DEFAULT_MAX_LINE_LENGTH
): AsyncGenerator<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder(encoding === "latin1" ? "iso-8859-1" : "utf-8");
  let buffer = "";
  let bytesProcessed = 0;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      bytesProcessed += value.length;
      buffer += decoder.decode(value, { stream: true });

      const result = processBuffer(buffer, maxLineLength);
      buffer = result.remainder;
      yield* result.lines;

      if (buffer.length > maxLineLength) {
        throw new StreamError(
          `Line too long: more than ${maxLineLength} characters without a line break`,
          "read",
          bytesProcessed
        );
      }
    }

    buffer += decoder.decode();
    const result = processBuffer(buffer, maxLineLength);
    yield* result.lines;
    if (result.remainder.trim() !== "") {
      yield result.remainder.endsWith("\r") ? result.remainder.slice(0, -1) : result.remainder;
    }
  } catch (error) {
    if (error instanceof StreamError) {
      throw error;
    }
    throw new StreamError(
      `Line reading failed: ${error instanceof Error ? error.message : String(error)}`,
      "read",
      bytesProcessed
    );
  } finally {
    reader.releaseLock();
  }
}
