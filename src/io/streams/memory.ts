import { BinaryIOBase, TextIOBase } from "./base.js";

/**
 * In-memory text stream, readable and writable. Writes overwrite from the
 * current position and extend the buffer past its end.
 */
export class StringTextIO extends TextIOBase {
  private value: string;
  private position = 0;

  constructor(initial = "", name?: string) {
    super(name);
    this.value = initial;
  }

  readable(): boolean {
    return true;
  }

  writable(): boolean {
    return true;
  }

  getValue(): string {
    this.ensureOpen();
    return this.value;
  }

  seek(position: number): void {
    this.ensureOpen();
    this.position = Math.max(0, Math.min(position, this.value.length));
  }

  tell(): number {
    this.ensureOpen();
    return this.position;
  }

  read(): string {
    this.ensureReadable();
    const rest = this.value.slice(this.position);
    this.position = this.value.length;
    return rest;
  }

  readLine(): string {
    this.ensureReadable();
    const newline = this.value.indexOf("\n", this.position);
    const end = newline === -1 ? this.value.length : newline + 1;
    const line = this.value.slice(this.position, end);
    this.position = end;
    return line;
  }

  write(text: string): number {
    this.ensureWritable();
    this.value =
      this.value.slice(0, this.position) + text + this.value.slice(this.position + text.length);
    this.position += text.length;
    return text.length;
  }
}

export class BytesIO extends BinaryIOBase {
  private buffer: Uint8Array;
  private position = 0;

  constructor(initial: Uint8Array = new Uint8Array(0), name?: string) {
    super(name);
    this.buffer = initial;
  }

  readable(): boolean {
    return true;
  }

  writable(): boolean {
    return true;
  }

  getValue(): Uint8Array {
    this.ensureOpen();
    return this.buffer;
  }

  read(): Uint8Array {
    this.ensureReadable();
    const rest = this.buffer.slice(this.position);
    this.position = this.buffer.length;
    return rest;
  }

  write(data: Uint8Array): number {
    this.ensureWritable();
    const end = this.position + data.length;
    const next = new Uint8Array(Math.max(end, this.buffer.length));
    next.set(this.buffer);
    next.set(data, this.position);
    this.buffer = next;
    this.position = end;
    return data.length;
  }
}
