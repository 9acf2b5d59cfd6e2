import { closeSync, fstatSync, mkdirSync, openSync, readSync, writeSync } from "node:fs";
import { dirname } from "node:path";
import { StringDecoder } from "node:string_decoder";
import { FileAccessError } from "../../errors/TextRefError.js";
import { BinaryIOBase, TextIOBase, parseMode, type BinaryMode, type OpenMode, type TextMode } from "./base.js";

const CHUNK_SIZE = 64 * 1024;

type Access = "read" | "write";

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error && typeof error.code === "string";
}

/**
 * Wraps a failed fs call in a FileAccessError; anything that is not a system
 * error is returned as is.
 */
export function toFileAccessError(error: unknown, path: string, action: string): unknown {
  if (!isErrnoException(error)) return error;
  return new FileAccessError(`Failed to ${action} "${path}": ${error.code}`, {
    details: { code: error.code, path, syscall: error.syscall },
    cause: error,
  });
}

/**
 * An open file descriptor plus the bookkeeping both file stream kinds need.
 */
export class FileDescriptor {
  constructor(
    readonly fd: number,
    readonly path: string,
    readonly access: Access,
  ) {}

  readChunk(): Buffer | null {
    const buffer = Buffer.allocUnsafe(CHUNK_SIZE);
    let bytes: number;
    try {
      bytes = readSync(this.fd, buffer, 0, CHUNK_SIZE, null);
    } catch (error) {
      throw toFileAccessError(error, this.path, "read");
    }
    return bytes === 0 ? null : buffer.subarray(0, bytes);
  }

  writeAll(data: Uint8Array): void {
    let offset = 0;
    try {
      while (offset < data.length) {
        offset += writeSync(this.fd, data, offset, data.length - offset);
      }
    } catch (error) {
      throw toFileAccessError(error, this.path, "write");
    }
  }

  close(): void {
    try {
      closeSync(this.fd);
    } catch (error) {
      throw toFileAccessError(error, this.path, "close");
    }
  }
}

/**
 * UTF-8 text stream over a file descriptor it owns.
 */
export class FileTextIO extends TextIOBase {
  private readonly decoder = new StringDecoder("utf8");
  private pending = "";
  private eof = false;

  constructor(
    private readonly file: FileDescriptor,
    name: string,
  ) {
    super(name);
  }

  get path(): string {
    return this.file.path;
  }

  readable(): boolean {
    return this.file.access === "read";
  }

  writable(): boolean {
    return this.file.access === "write";
  }

  private fill(): boolean {
    if (this.eof) return false;
    const chunk = this.file.readChunk();
    if (chunk === null) {
      this.eof = true;
      this.pending += this.decoder.end();
      return false;
    }
    this.pending += this.decoder.write(chunk);
    return true;
  }

  read(): string {
    this.ensureReadable();
    while (this.fill()) {
      // drain
    }
    const rest = this.pending;
    this.pending = "";
    return rest;
  }

  readLine(): string {
    this.ensureReadable();
    let newline = this.pending.indexOf("\n");
    while (newline === -1 && this.fill()) {
      newline = this.pending.indexOf("\n");
    }
    const end = newline === -1 ? this.pending.length : newline + 1;
    const line = this.pending.slice(0, end);
    this.pending = this.pending.slice(end);
    return line;
  }

  write(text: string): number {
    this.ensureWritable();
    this.file.writeAll(Buffer.from(text, "utf8"));
    return text.length;
  }

  protected release(): void {
    this.file.close();
  }
}

export class FileBinaryIO extends BinaryIOBase {
  constructor(
    private readonly file: FileDescriptor,
    name: string,
  ) {
    super(name);
  }

  get path(): string {
    return this.file.path;
  }

  readable(): boolean {
    return this.file.access === "read";
  }

  writable(): boolean {
    return this.file.access === "write";
  }

  read(): Uint8Array {
    this.ensureReadable();
    const chunks: Buffer[] = [];
    for (let chunk = this.file.readChunk(); chunk !== null; chunk = this.file.readChunk()) {
      chunks.push(chunk);
    }
    return Buffer.concat(chunks);
  }

  write(data: Uint8Array): number {
    this.ensureWritable();
    this.file.writeAll(data);
    return data.length;
  }

  protected release(): void {
    this.file.close();
  }
}

export interface OpenFileOptions {
  /** Create missing parent directories when opening for writing. */
  createDirectories?: boolean;
}

/**
 * Opens a filesystem path. Reading requires an existing regular file; writing
 * creates or truncates it. System errors surface as FileAccessError.
 */
export function openFile(path: string, mode?: TextMode, options?: OpenFileOptions): FileTextIO;
export function openFile(path: string, mode: BinaryMode, options?: OpenFileOptions): FileBinaryIO;
export function openFile(
  path: string,
  mode?: OpenMode,
  options?: OpenFileOptions,
): FileTextIO | FileBinaryIO;
export function openFile(
  path: string,
  mode: OpenMode = "r",
  options: OpenFileOptions = {},
): FileTextIO | FileBinaryIO {
  const { access, kind } = parseMode(mode);

  let fd: number;
  try {
    if (access === "write" && options.createDirectories) {
      mkdirSync(dirname(path), { recursive: true });
    }
    fd = openSync(path, access === "read" ? "r" : "w");
  } catch (error) {
    throw toFileAccessError(error, path, "open");
  }

  // open(2) accepts directories for reading; reads would fail later with EISDIR
  let isDirectory: boolean;
  try {
    isDirectory = fstatSync(fd).isDirectory();
  } catch (error) {
    const statError = toFileAccessError(error, path, "stat");
    try {
      closeSync(fd);
    } catch {
      // the stat failure is the one reported
    }
    throw statError;
  }
  if (isDirectory) {
    closeSync(fd);
    throw new FileAccessError(`Failed to open "${path}": EISDIR`, {
      details: { code: "EISDIR", path, syscall: "open" },
    });
  }

  const file = new FileDescriptor(fd, path, access);
  return kind === "text" ? new FileTextIO(file, path) : new FileBinaryIO(file, path);
}
