/**
 * Unit tests for JSON-lines reading and writing
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gunzipSync, gzipSync } from "node:zlib";
import { JsonLinesWriter, isGzipPath, parseRecord, readJsonLines, type JsonLine } from "../jsonl.js";
import { PageHtmlRecordSchema } from "../schemas.js";
import { PipelineError } from "../../utils/errors.js";

async function collect(path: string): Promise<JsonLine[]> {
  const lines: JsonLine[] = [];
  for await (const line of readJsonLines(path)) {
    lines.push(line);
  }
  return lines;
}

describe("JSON lines", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "jsonl-test-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe("isGzipPath", () => {
    it("should select gzip by the .gz suffix", () => {
      expect(isGzipPath("pages.jsonl.gz")).toBe(true);
      expect(isGzipPath("pages.jsonl")).toBe(false);
    });
  });

  describe("JsonLinesWriter", () => {
    it("should write gzip-compressed lines", async () => {
      const path = join(dir, "out.jsonl.gz");
      const writer = new JsonLinesWriter(path);
      await writer.write({ id: 0, text: "日本語" });
      await writer.write({ id: 1, text: "second" });
      expect(await writer.close()).toBe(2);

      const raw = await readFile(path);
      expect([raw[0], raw[1]]).toEqual([0x1f, 0x8b]);
      expect(gunzipSync(raw).toString("utf8")).toBe(
        '{"id":0,"text":"日本語"}\n{"id":1,"text":"second"}\n'
      );
    });

    it("should write plain lines without the .gz suffix", async () => {
      const path = join(dir, "out.jsonl");
      const writer = new JsonLinesWriter(path);
      await writer.write({ id: 0 });
      await writer.close();

      expect(await readFile(path, "utf8")).toBe('{"id":0}\n');
    });

    it("should fail with IO_ERROR when the file cannot be created", async () => {
      const writer = new JsonLinesWriter(join(dir, "missing", "out.jsonl.gz"));
      const run = async (): Promise<void> => {
        await writer.write({ id: 0 });
        await writer.close();
      };

      const error = await run().catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(PipelineError);
      expect(error).toMatchObject({ payload: { code: "IO_ERROR" } });
    });

    it("should release the file on abort", async () => {
      const writer = new JsonLinesWriter(join(dir, "aborted.jsonl.gz"));
      await writer.write({ id: 0 });
      await expect(writer.abort()).resolves.toBeUndefined();
    });
  });

  describe("readJsonLines", () => {
    it("should read what the writer wrote", async () => {
      const path = join(dir, "round.jsonl.gz");
      const writer = new JsonLinesWriter(path);
      await writer.write({ pageid: 1, title: "タイトル" });
      await writer.write({ pageid: 2, title: "Second" });
      await writer.close();

      expect(await collect(path)).toEqual([
        { line: 1, value: { pageid: 1, title: "タイトル" } },
        { line: 2, value: { pageid: 2, title: "Second" } },
      ]);
    });

    it("should skip blank lines and read a final line without newline", async () => {
      const path = join(dir, "plain.jsonl");
      await writeFile(path, '{"a":1}\n\n{"a":2}', "utf8");

      expect(await collect(path)).toEqual([
        { line: 1, value: { a: 1 } },
        { line: 3, value: { a: 2 } },
      ]);
    });

    it("should read CRLF-terminated lines", async () => {
      const path = join(dir, "crlf.jsonl.gz");
      await writeFile(path, gzipSync('{"a":1}\r\n\r\n{"a":2}\r\n'));

      expect(await collect(path)).toEqual([
        { line: 1, value: { a: 1 } },
        { line: 3, value: { a: 2 } },
      ]);
    });

    it("should reject invalid JSON with the line number", async () => {
      const path = join(dir, "bad.jsonl.gz");
      await writeFile(path, gzipSync('{"a":1}\n{not json}\n'));

      await expect(collect(path)).rejects.toMatchObject({
        payload: { code: "INPUT_FORMAT_ERROR", details: { file: path, line: 2 } },
      });
    });

    it("should reject a missing file with IO_ERROR", async () => {
      await expect(collect(join(dir, "absent.jsonl.gz"))).rejects.toMatchObject({
        payload: { code: "IO_ERROR" },
      });
    });

    it("should reject a file that is not gzip data", async () => {
      const path = join(dir, "fake.jsonl.gz");
      await writeFile(path, "plain text, not gzip\n", "utf8");

      await expect(collect(path)).rejects.toMatchObject({ payload: { code: "IO_ERROR" } });
    });
  });

  describe("parseRecord", () => {
    it("should return validated data", () => {
      const value = { pageid: 1, revid: 2, title: "T", html: "<p>x</p>" };
      expect(parseRecord(PageHtmlRecordSchema, { line: 1, value }, "in.gz")).toEqual(value);
    });

    it("should reject a record missing a field", () => {
      const entry = { line: 4, value: { pageid: 1, revid: 2, title: "T" } };
      expect(() => parseRecord(PageHtmlRecordSchema, entry, "in.gz")).toThrow(
        /^Malformed record at in\.gz:4: html: /
      );
    });
  });
});
