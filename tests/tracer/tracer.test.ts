import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import chalk from "chalk";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { load } from "../../src/io/plain.js";
import { Tracer, traced } from "../../src/tracer/tracer.js";
import type { SpanData } from "../../src/tracer/types.js";
import { SimpleWriter } from "../../src/tracer/writers/simple.js";

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "textref-tracer-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function recordingTracer(showInternal: boolean) {
  const lines: string[] = [];
  const writer = new SimpleWriter({
    minLevel: "debug",
    showInternal,
    showTimestamp: false,
    showDuration: false,
    output: (line) => lines.push(line),
  });
  const tracer = new Tracer({ minLevel: "debug", writers: [writer] });
  return { tracer, lines };
}

describe("openx tracing", () => {
  it("should trace an acquisition as an internal child span", () => {
    const path = join(dir, "traced.txt");
    writeFileSync(path, "x");
    const { tracer, lines } = recordingTracer(true);

    const root = tracer.startSpan("read config", { type: "io" });
    load(path, { tracer: root, variables: { cwd: dir } });
    root.end();

    expect(lines).toEqual([
      "START [io] read config",
      "  START [internal] openx",
      "    DEBUG stream opened",
      "    DEBUG connector closed",
      "  END   [internal] openx",
      "END   [io] read config",
    ]);
  });

  it("should bubble events of hidden spans to the visible parent", () => {
    const path = join(dir, "hidden.txt");
    writeFileSync(path, "x");
    const { tracer, lines } = recordingTracer(false);

    const root = tracer.startSpan("read config");
    load(path, { tracer: root, variables: { cwd: dir } });
    root.end();

    expect(lines).toEqual([
      "START read config",
      "  DEBUG stream opened",
      "  DEBUG connector closed",
      "END   read config",
    ]);
  });

  it("should end the span with an error when the open fails", () => {
    const path = join(dir, "missing.txt");
    const { tracer, lines } = recordingTracer(true);

    const root = tracer.startSpan("read");
    expect(() => load(path, { tracer: root, variables: { cwd: dir } })).toThrow();

    expect(lines).toEqual([
      "START read",
      "  START [internal] openx",
      `    ERROR Failed to open "${path}": ENOENT`,
      "  END   [internal] openx [ERROR]",
    ]);
  });
});

describe("SimpleWriter", () => {
  it("should forget spans once they and their children have ended", () => {
    const path = join(dir, "many.txt");
    writeFileSync(path, "x");
    const writer = new SimpleWriter({ output: () => {} });
    const tracer = new Tracer({ writers: [writer] });

    const root = tracer.startSpan("batch");
    for (let i = 0; i < 1000; i++) {
      load(path, { tracer: root, variables: { cwd: dir } });
    }
    expect(writer.trackedSpans).toBe(1);
    root.end();
    expect(writer.trackedSpans).toBe(0);
  });

  it("should keep an ended parent while a child is still open", () => {
    const lines: string[] = [];
    const writer = new SimpleWriter({
      showTimestamp: false,
      showDuration: false,
      output: (line) => lines.push(line),
    });
    const tracer = new Tracer({ writers: [writer] });

    const root = tracer.startSpan("root");
    const child = root.startSpan("child");
    root.end();
    expect(writer.trackedSpans).toBe(2);
    child.info("late");
    child.end();
    expect(writer.trackedSpans).toBe(0);
    expect(lines).toEqual(["START root", "  START child", "END   root", "    INFO  late", "  END   child"]);
  });

  describe("with color", () => {
    const level = chalk.level;

    afterEach(() => {
      chalk.level = level;
    });

    it("should color level labels", () => {
      chalk.level = 1;
      const lines: string[] = [];
      const writer = new SimpleWriter({
        minLevel: "debug",
        color: true,
        showTimestamp: false,
        output: (line) => lines.push(line),
      });
      const tracer = new Tracer({ minLevel: "debug", writers: [writer] });

      const root = tracer.startSpan("colored");
      root.debug("quiet");
      root.error("loud");

      expect(lines).toEqual([
        "START colored",
        "  \u001b[90mDEBUG\u001b[39m quiet",
        "  \u001b[31mERROR\u001b[39m loud",
      ]);
    });
  });
});

describe("Tracer", () => {
  it("should drop events below the minimum level", () => {
    const events: string[] = [];
    const tracer = new Tracer({
      writers: [
        {
          onSpanStart: () => {},
          onSpanEnd: () => {},
          onEvent: (_span, event) => events.push(`${event.level}:${event.name}`),
        },
      ],
    });
    const span = tracer.startSpan("levels");
    span.debug("hidden");
    span.info("shown");
    span.warn("warned");
    span.end();
    span.error("after end");
    expect(events).toEqual(["info:shown", "warn:warned"]);
  });

  it("should record attributes and status on the span data", () => {
    const ended: SpanData[] = [];
    const tracer = new Tracer({
      writers: [{ onSpanStart: () => {}, onSpanEnd: (span) => ended.push(span) }],
    });
    const root = tracer.startSpan("root");
    expect(() =>
      traced(root, "child", (span) => {
        span?.setAttribute("path", "/x");
        throw new Error("nope");
      }),
    ).toThrow("nope");
    root.end();

    expect(ended.map((s) => [s.name, s.status])).toEqual([
      ["child", "error"],
      ["root", "ok"],
    ]);
    expect(ended[0].attributes).toEqual({ path: "/x" });
    expect(ended[0].parentSpanId).toBe(ended[1].spanId);
    expect(ended[0].traceId).toBe(ended[1].traceId);
  });

  it("should run without a span when there is no parent", () => {
    expect(traced(undefined, "none", (span) => span)).toBeUndefined();
  });
});
