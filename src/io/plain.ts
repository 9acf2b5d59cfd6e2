import { InvalidStreamError } from "../errors/TextRefError.js";
import { traced } from "../tracer/tracer.js";
import type { TracingContext } from "../tracer/types.js";
import { FileConnector, type ConnectorOptions, type FileRef } from "./connector.js";
import { isTextStream, type OpenMode, type TextIOBase, type TextMode } from "./streams/base.js";

export interface TextOptions extends ConnectorOptions {
  /** Parent span; each acquisition is traced as an internal "openx" span. */
  tracer?: TracingContext;
}

const TEXT_MODES: Record<TextMode, OpenMode> = {
  r: "rt",
  w: "wt",
  rt: "rt",
  wt: "wt",
};

/**
 * Opens `file` as a text stream for the duration of `body`.
 *
 * `file` may be a path (with `%var%` placeholders and a leading `~` expanded),
 * a `file:` URL, an open stream or a connector. The connector is closed exactly
 * once when `body` returns or throws, which closes files opened from a path
 * and leaves caller-supplied streams open. When `open` itself throws, the
 * connector is not closed.
 *
 * @throws ResolutionError if `file` cannot be resolved
 * @throws FileAccessError if the underlying open fails
 * @throws InvalidStreamError if the opened stream is not a text stream; the
 *   connector is closed before `body` ever runs
 */
export function openx<T>(
  file: FileRef,
  mode: TextMode,
  body: (stream: TextIOBase) => T,
  options: TextOptions = {},
): T {
  const { tracer, ...connectorOptions } = options;
  const textMode = TEXT_MODES[mode];

  return traced(tracer, "openx", (span) => {
    const connector = new FileConnector(file, connectorOptions);
    span?.setAttributes({ name: connector.name ?? null, mode: textMode });
    // a failed open acquired nothing; closing would release the connector's live stream
    const stream = connector.open(textMode);
    try {
      if (!isTextStream(stream)) {
        throw new InvalidStreamError("The opened stream is not a valid text stream", {
          details: { name: connector.name, kind: stream.kind },
        });
      }
      span?.debug("stream opened");
      return body(stream);
    } finally {
      connector.close();
      span?.debug("connector closed");
    }
  });
}

/**
 * Reads the whole content of a text file.
 */
export function load(file: FileRef, options?: TextOptions): string {
  return openx(file, "r", (stream) => stream.read(), options);
}

/**
 * Writes `text` to a file verbatim, replacing its content.
 */
export function save(text: string, file: FileRef, options?: TextOptions): void {
  openx(file, "w", (stream) => stream.write(text), options);
}

/**
 * Reads the leading comment block of a text file: the `#` lines before the
 * first non-blank line that is not a comment. Blank lines inside the block are
 * skipped. Markers and the whitespace after them are removed, line breaks are
 * kept, and trailing whitespace of the result is trimmed.
 */
export function getComment(file: FileRef, options?: TextOptions): string {
  const lines: string[] = [];
  openx(
    file,
    "r",
    (stream) => {
      for (const line of stream) {
        const stripped = line.trimStart(); // keeps the line break
        if (!stripped.trimEnd()) continue;
        if (!stripped.startsWith("#")) break;
        lines.push(stripped.slice(1).trimStart());
      }
    },
    options,
  );
  return lines.join("").trimEnd();
}

/**
 * Reads the non-blank, non-comment lines of a text file without their line
 * terminators. A non-zero `limit` caps the number of lines returned.
 */
export function getContent(file: FileRef, limit = 0, options?: TextOptions): string[] {
  const content: string[] = [];
  openx(
    file,
    "r",
    (stream) => {
      for (const line of stream) {
        if (limit !== 0 && content.length >= limit) break;
        const stripped = line.trim();
        if (!stripped || stripped.startsWith("#")) continue;
        content.push(line.replace(/[\r\n]+$/, ""));
      }
    },
    options,
  );
  return content;
}

/**
 * Name of the referenced resource, or undefined when it cannot be determined.
 * Resolves the reference but never opens it.
 */
export function getName(file: FileRef, options?: ConnectorOptions): string | undefined {
  return new FileConnector(file, options).name;
}
