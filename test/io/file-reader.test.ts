/**
 * Tests for file access and line streaming
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { FileError, StreamError } from "../../src/errors";
import { createStream, exists, getSize, readToString } from "../../src/io/file-reader";
import { processBuffer, readLines } from "../../src/io/stream-utils";
import { collect, thrown } from "../helpers";

let dir = "";
const path = (name: string): string => join(dir, name);

beforeAll(() => {
  dir = mkdtempSync(join(tmpdir(), "genbank-io-"));
  writeFileSync(path("small.txt"), "LOCUS a\nORIGIN\n");
  writeFileSync(path("crlf.txt"), "one\r\ntwo\r\n\r\nthree");
  writeFileSync(path("empty.txt"), "");
  mkdirSync(path("folder"));
});

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

function streamOf(...chunks: (string | Uint8Array)[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(typeof chunk === "string" ? encoder.encode(chunk) : chunk);
      }
      controller.close();
    },
  });
}

describe("file reader", () => {
  test("should detect regular files", async () => {
    expect(await exists(path("small.txt"))).toBe(true);
    expect(await exists(path("empty.txt"))).toBe(true);
    expect(await exists(path("missing.txt"))).toBe(false);
    expect(await exists(path("folder"))).toBe(false);
  });

  test("should report sizes in bytes", async () => {
    expect(await getSize(path("small.txt"))).toBe(15);
    expect(await getSize(path("empty.txt"))).toBe(0);
    await expect(getSize(path("missing.txt"))).rejects.toThrow(FileError);
  });

  test("should read whole files", async () => {
    expect(await readToString(path("small.txt"))).toBe("LOCUS a\nORIGIN\n");
  });

  test("should enforce maxFileSize", async () => {
    await expect(readToString(path("small.txt"), { maxFileSize: 4 })).rejects.toThrow(
      "File too large: 15 bytes exceeds limit of 4 bytes"
    );
  });

  test("should validate options and paths", async () => {
    await expect(readToString(path("small.txt"), { bufferSize: 10 })).rejects.toThrow(
      /Invalid file reader options/
    );
    await expect(exists("")).rejects.toThrow(/Invalid file path/);
    await expect(exists("bad\0path")).rejects.toThrow(/Invalid file path/);
  });

  test("should stream file lines", async () => {
    const stream = await createStream(path("crlf.txt"));
    expect(await collect(readLines(stream))).toEqual(["one", "two", "", "three"]);
  });

  test("should refuse to stream missing files", async () => {
    await expect(createStream(path("missing.txt"))).rejects.toThrow(
      "File does not exist or is not accessible"
    );
  });
});

describe("stream utilities", () => {
  test("should split complete lines and keep the remainder", () => {
    expect(processBuffer("a\nb\r\nc")).toEqual({ lines: ["a", "b"], remainder: "c" });
  });

  test("should reject lines over the limit", () => {
    const error = thrown(() => processBuffer("abcdef\n", 3), StreamError);
    expect(error.message).toBe("Line too long: 6 characters exceeds maximum 3");
  });

  test("should join lines split across chunks", async () => {
    const lines = await collect(readLines(streamOf("LOCUS a\r", "\nDEF", "INITION b\n\nlast")));
    expect(lines).toEqual(["LOCUS a", "DEFINITION b", "", "last"]);
  });

  test("should decode characters split across chunks", async () => {
    const bytes = new TextEncoder().encode("/note=\"café\"\n");
    const cut = bytes.indexOf(0xc3) + 1;
    const lines = await collect(readLines(streamOf(bytes.slice(0, cut), bytes.slice(cut))));
    expect(lines).toEqual(['/note="café"']);
  });

  test("should decode latin1", async () => {
    const lines = await collect(readLines(streamOf(new Uint8Array([0x63, 0x61, 0x66, 0xe9])), "latin1"));
    expect(lines).toEqual(["café"]);
  });
});
