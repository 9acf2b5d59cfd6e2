import {
  InvalidModeError,
  InvalidStreamError,
  UnsupportedOperationError,
} from "../../errors/TextRefError.js";

export type TextMode = "r" | "w" | "rt" | "wt";
export type BinaryMode = "rb" | "wb";
export type OpenMode = TextMode | BinaryMode;

export type StreamKind = "text" | "binary";

export interface ParsedMode {
  access: "read" | "write";
  kind: StreamKind;
}

/**
 * Parses a mode string made of one access character (`r` or `w`) and at most
 * one kind character (`t`, the default, or `b`).
 */
export function parseMode(mode: string): ParsedMode {
  let access: ParsedMode["access"] | undefined;
  let kind: StreamKind | undefined;

  for (const char of mode) {
    switch (char) {
      case "r":
      case "w":
        if (access) throw new InvalidModeError(mode, "must have exactly one of read/write");
        access = char === "r" ? "read" : "write";
        break;
      case "t":
      case "b":
        if (kind) throw new InvalidModeError(mode, "can't have text and binary mode at once");
        kind = char === "t" ? "text" : "binary";
        break;
      default:
        throw new InvalidModeError(mode, `unknown mode character "${char}"`);
    }
  }

  if (!access) throw new InvalidModeError(mode, "must have exactly one of read/write");
  return { access, kind: kind ?? "text" };
}

/**
 * Common ground of every stream a connector can hand out.
 */
export abstract class IOBase {
  abstract readonly kind: StreamKind;
  private _closed = false;

  constructor(readonly name: string | undefined) {}

  get closed(): boolean {
    return this._closed;
  }

  abstract readable(): boolean;
  abstract writable(): boolean;

  /**
   * Closes the stream. Further operations throw; closing twice is a no-op.
   */
  close(): void {
    if (this._closed) return;
    this._closed = true;
    this.release();
  }

  /** Releases the underlying resource, called once by close(). */
  protected release(): void {}

  protected ensureOpen(): void {
    if (this._closed) {
      throw new InvalidStreamError("I/O operation on closed stream", { details: { name: this.name } });
    }
  }

  protected ensureReadable(): void {
    this.ensureOpen();
    if (!this.readable()) {
      throw new UnsupportedOperationError("Stream is not readable", { details: { name: this.name } });
    }
  }

  protected ensureWritable(): void {
    this.ensureOpen();
    if (!this.writable()) {
      throw new UnsupportedOperationError("Stream is not writable", { details: { name: this.name } });
    }
  }
}

/**
 * A stream of text. Iterating yields lines, each keeping its trailing `\n`
 * (the last line may have none).
 */
export abstract class TextIOBase extends IOBase implements Iterable<string> {
  readonly kind = "text" as const;

  /** Reads up to the end of the stream. */
  abstract read(): string;

  /** Reads one line including its `\n`, or "" at the end of the stream. */
  abstract readLine(): string;

  /** Writes `text` and returns its length in UTF-16 code units. */
  abstract write(text: string): number;

  readLines(): string[] {
    return [...this];
  }

  *[Symbol.iterator](): Iterator<string> {
    for (let line = this.readLine(); line !== ""; line = this.readLine()) {
      yield line;
    }
  }
}

export abstract class BinaryIOBase extends IOBase {
  readonly kind = "binary" as const;

  abstract read(): Uint8Array;

  abstract write(data: Uint8Array): number;
}

export function isTextStream(value: unknown): value is TextIOBase {
  return value instanceof TextIOBase;
}
