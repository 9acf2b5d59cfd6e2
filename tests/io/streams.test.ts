import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  InvalidModeError,
  InvalidStreamError,
  UnsupportedOperationError,
} from "../../src/errors/TextRefError.js";
import { isTextStream, parseMode } from "../../src/io/streams/base.js";
import { openFile } from "../../src/io/streams/file.js";
import { BytesIO, StringTextIO } from "../../src/io/streams/memory.js";

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "textref-streams-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("parseMode", () => {
  it("should default to text", () => {
    expect(parseMode("r")).toEqual({ access: "read", kind: "text" });
    expect(parseMode("wt")).toEqual({ access: "write", kind: "text" });
    expect(parseMode("rb")).toEqual({ access: "read", kind: "binary" });
  });

  it("should reject invalid combinations", () => {
    expect(() => parseMode("rbt")).toThrow(InvalidModeError);
    expect(() => parseMode("rw")).toThrow('Invalid mode "rw": must have exactly one of read/write');
    expect(() => parseMode("t")).toThrow(InvalidModeError);
    expect(() => parseMode("ra")).toThrow('Invalid mode "ra": unknown mode character "a"');
  });
});

describe("FileTextIO", () => {
  it("should iterate lines keeping their terminators", () => {
    const path = join(dir, "lines.txt");
    writeFileSync(path, "one\ntwo\r\nthree");
    const stream = openFile(path);
    expect(stream.readLines()).toEqual(["one\n", "two\r\n", "three"]);
    expect(stream.readLine()).toBe("");
    stream.close();
  });

  it("should decode characters split across read chunks", () => {
    const path = join(dir, "wide.txt");
    const first = "a".repeat(64 * 1024 - 1) + "é\n";
    writeFileSync(path, first + "tail");
    const stream = openFile(path);
    expect(stream.readLine()).toBe(first);
    expect(stream.read()).toBe("tail");
    stream.close();
  });

  it("should refuse writes on a read stream and reads on a write stream", () => {
    const path = join(dir, "modes.txt");
    const writer = openFile(path, "w");
    expect(() => writer.read()).toThrow(UnsupportedOperationError);
    writer.write("written");
    writer.close();
    expect(readFileSync(path, "utf-8")).toBe("written");

    const reader = openFile(path, "r");
    expect(() => reader.write("x")).toThrow("Stream is not writable");
    reader.close();
  });

  it("should refuse operations after close", () => {
    const path = join(dir, "closed.txt");
    writeFileSync(path, "x");
    const stream = openFile(path);
    stream.close();
    expect(stream.closed).toBe(true);
    expect(() => stream.read()).toThrow(InvalidStreamError);
  });
});

describe("write", () => {
  it("should report the length in UTF-16 code units", () => {
    const path = join(dir, "units.txt");
    const text = "é✓😀";
    const writer = openFile(path, "w");
    expect(writer.write(text)).toBe(4);
    writer.close();
    expect(readFileSync(path, "utf-8")).toBe(text);
    expect(new StringTextIO().write(text)).toBe(4);
  });
});

describe("FileBinaryIO", () => {
  it("should read and write bytes", () => {
    const path = join(dir, "data.bin");
    const writer = openFile(path, "wb");
    expect(writer.write(new Uint8Array([7, 8, 9]))).toBe(3);
    writer.close();

    const reader = openFile(path, "rb");
    expect(isTextStream(reader)).toBe(false);
    expect([...reader.read()]).toEqual([7, 8, 9]);
    reader.close();
  });
});

describe("StringTextIO", () => {
  it("should read lines and overwrite from the current position", () => {
    const stream = new StringTextIO("ab\ncd\n");
    expect(stream.readLine()).toBe("ab\n");
    stream.write("XY");
    expect(stream.getValue()).toBe("ab\nXY\n");
    stream.seek(0);
    expect([...stream]).toEqual(["ab\n", "XY\n"]);
    expect(stream.tell()).toBe(6);
  });
});

describe("BytesIO", () => {
  it("should grow when writing past the end", () => {
    const stream = new BytesIO(new Uint8Array([1, 2]));
    stream.read();
    stream.write(new Uint8Array([3]));
    expect([...stream.getValue()]).toEqual([1, 2, 3]);
  });
});
