/**
 * Line-delimited JSON files, gzip-compressed when the path ends in `.gz`
 */

import { once } from "node:events";
import { createReadStream, createWriteStream } from "node:fs";
import * as readline from "node:readline";
import type { Readable, Writable } from "node:stream";
import { finished, pipeline } from "node:stream/promises";
import { createGunzip, createGzip } from "node:zlib";
import type { z } from "zod";

import { PipelineError, inputFormatError, ioError } from "../utils/errors.js";

export interface JsonLine {
  /** 1-based line number in the decompressed file */
  line: number;
  value: unknown;
}

export function isGzipPath(path: string): boolean {
  return path.endsWith(".gz");
}

function wrapIoError(operation: string, path: string, error: unknown): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }
  return new PipelineError(
    ioError(operation, path, error instanceof Error ? error.message : String(error)),
    { cause: error }
  );
}

function openText(path: string): { input: Readable; done: Promise<void> } {
  const source = createReadStream(path);
  if (!isGzipPath(path)) {
    source.setEncoding("utf8");
    return { input: source, done: Promise.resolve() };
  }

  const gunzip = createGunzip();
  gunzip.setEncoding("utf8");
  // A failing source destroys gunzip, so the error reaches the reader's iterator
  const done = pipeline(source, gunzip);
  done.catch(() => undefined);
  return { input: gunzip, done };
}

function parseLine(text: string, line: number, path: string): JsonLine {
  try {
    return { line, value: JSON.parse(text) };
  } catch (error) {
    throw new PipelineError(
      inputFormatError(path, line, error instanceof Error ? error.message : String(error)),
      { cause: error }
    );
  }
}

/**
 * Read a JSON-lines file one record at a time. Blank lines are skipped.
 * Invalid JSON aborts with INPUT_FORMAT_ERROR; read failures with IO_ERROR.
 */
export async function* readJsonLines(path: string): AsyncGenerator<JsonLine, void, undefined> {
  const { input, done } = openText(path);
  const lines = readline.createInterface({
    input,
    crlfDelay: Infinity,
  });
  let line = 0;

  try {
    for await (const text of lines) {
      line++;
      if (text.trim()) {
        yield parseLine(text, line, path);
      }
    }
    await done;
  } catch (error) {
    throw wrapIoError("read", path, error);
  } finally {
    lines.close();
    input.destroy();
  }
}

/**
 * Validate one parsed line against a schema
 */
export function parseRecord<T extends z.ZodTypeAny>(
  schema: T,
  entry: JsonLine,
  path: string
): z.output<T> {
  const result = schema.safeParse(entry.value);
  if (!result.success) {
    const reason = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new PipelineError(inputFormatError(path, entry.line, reason));
  }
  return result.data;
}

/**
 * Sequential JSON-lines writer. Call close() on success and abort() on failure.
 */
export class JsonLinesWriter {
  private readonly sink: Writable;
  private readonly done: Promise<void>;
  private failure: unknown = null;
  private count = 0;

  constructor(readonly path: string) {
    const file = createWriteStream(path);
    if (isGzipPath(path)) {
      const gzip = createGzip();
      this.sink = gzip;
      this.done = this.track(pipeline(gzip, file));
    } else {
      this.sink = file;
      this.done = this.track(finished(file));
    }
  }

  private track(completion: Promise<void>): Promise<void> {
    return completion.then(undefined, (error: unknown) => {
      this.failure = error;
    });
  }

  private throwIfFailed(): void {
    if (this.failure !== null) {
      throw wrapIoError("write", this.path, this.failure);
    }
  }

  /**
   * Number of records written so far
   */
  get written(): number {
    return this.count;
  }

  async write(record: unknown): Promise<void> {
    this.throwIfFailed();
    try {
      if (!this.sink.write(`${JSON.stringify(record)}\n`)) {
        await once(this.sink, "drain");
      }
    } catch (error) {
      throw wrapIoError("write", this.path, error);
    }
    this.count++;
  }

  /**
   * Flush and close the file; returns the number of records written
   */
  async close(): Promise<number> {
    this.sink.end();
    await this.done;
    this.throwIfFailed();
    return this.count;
  }

  /**
   * Release the file without waiting for buffered output
   */
  async abort(): Promise<void> {
    this.sink.destroy();
    await this.done;
  }
}
