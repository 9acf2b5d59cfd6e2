import { fileURLToPath } from "node:url";
import { getVariables } from "../env/environment.js";
import { expandPath, type VariableTable } from "../env/variables.js";
import { InvalidStreamError, ResolutionError } from "../errors/TextRefError.js";
import { pathToComponents } from "../utils/file.js";
import { IOBase, type OpenMode } from "./streams/base.js";
import { openFile, type OpenFileOptions } from "./streams/file.js";

/**
 * Mediates between a file reference and a live stream.
 *
 * `open` may be called once per read or write session; `close` releases
 * whatever `open` acquired and must be safe to call more than once. A
 * connector never closes a stream it did not open itself.
 */
export interface Connector {
  /** Human-meaningful name of the resource, or undefined when unknown. */
  readonly name: string | undefined;
  open(mode?: OpenMode): IOBase;
  close(): void;
}

/**
 * Anything that denotes a text resource: a path (which may contain `%var%`
 * placeholders), a `file:` URL, an open stream, or a connector.
 */
export type FileRef = string | URL | IOBase | Connector;

export interface ConnectorOptions extends OpenFileOptions {
  /** Variable table for path expansion; defaults to the process-wide one. */
  variables?: VariableTable;
}

export function isConnector(value: unknown): value is Connector {
  return (
    typeof value === "object" &&
    value !== null &&
    !(value instanceof IOBase) &&
    "name" in value &&
    "open" in value &&
    typeof value.open === "function" &&
    "close" in value &&
    typeof value.close === "function"
  );
}

/**
 * Connector for a filesystem path. The path is expanded when the connector is
 * built; the file itself is only touched by open().
 */
export class PathConnector implements Connector {
  readonly path: string;
  private readonly options: OpenFileOptions;
  private stream: IOBase | undefined;

  constructor(ref: string | URL, options: ConnectorOptions = {}) {
    const { variables, ...openOptions } = options;
    this.path = expandPath(toPathString(ref), variables ?? getVariables());
    this.options = openOptions;
  }

  get name(): string | undefined {
    return pathToComponents(this.path)?.stem;
  }

  open(mode: OpenMode = "r"): IOBase {
    if (this.stream && !this.stream.closed) {
      throw new InvalidStreamError(`"${this.path}" is already open`, {
        details: { path: this.path },
      });
    }
    this.stream = openFile(this.path, mode, this.options);
    return this.stream;
  }

  close(): void {
    const stream = this.stream;
    this.stream = undefined;
    stream?.close();
  }
}

/**
 * Connector around a stream supplied by the caller. The stream is handed out
 * as is, whatever mode is asked for, and is left open on close().
 */
export class StreamConnector implements Connector {
  constructor(readonly stream: IOBase) {}

  get name(): string | undefined {
    return this.stream.name;
  }

  open(): IOBase {
    return this.stream;
  }

  close(): void {}
}

/**
 * Resolves any file reference to a connector. Connectors pass through
 * unchanged.
 */
export function resolveConnector(ref: unknown, options: ConnectorOptions = {}): Connector {
  if (typeof ref === "string" || ref instanceof URL) {
    return new PathConnector(ref, options);
  }
  if (ref instanceof IOBase) {
    return new StreamConnector(ref);
  }
  if (isConnector(ref)) {
    return ref;
  }
  throw new ResolutionError(`Unsupported file reference: ${describeRef(ref)}`, {
    details: { type: describeRef(ref) },
  });
}

/**
 * The connector every helper acquires. It resolves the reference once and
 * delegates to the resolved connector.
 */
export class FileConnector implements Connector {
  private readonly target: Connector;

  constructor(ref: FileRef, options: ConnectorOptions = {}) {
    this.target = resolveConnector(ref, options);
  }

  get name(): string | undefined {
    return this.target.name;
  }

  open(mode: OpenMode = "r"): IOBase {
    return this.target.open(mode);
  }

  close(): void {
    this.target.close();
  }
}

function toPathString(ref: string | URL): string {
  if (typeof ref === "string") {
    if (ref.length === 0) {
      throw new ResolutionError("Empty path is not a file reference");
    }
    return ref;
  }
  if (ref.protocol !== "file:") {
    throw new ResolutionError(`Unsupported URL scheme "${ref.protocol}" in ${ref.href}`, {
      details: { url: ref.href },
    });
  }
  return fileURLToPath(ref);
}

function describeRef(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "object") return value.constructor?.name ?? "object";
  return typeof value;
}
