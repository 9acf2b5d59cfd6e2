import { randomUUID } from "node:crypto";
import type {
  EventLevel,
  SpanData,
  SpanEvent,
  SpanOptions,
  SpanStatus,
  TraceWriter,
  TracingContext,
} from "./types.js";

export const levelOrder: Record<EventLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface TracerOptions {
  minLevel?: EventLevel;
  writers?: TraceWriter[];
}

/**
 * Root tracer that manages writers and creates spans.
 * The I/O helpers never create a Tracer themselves; callers hand them a
 * TracingContext and every acquisition becomes a child span of it.
 */
export class Tracer {
  private writers: TraceWriter[] = [];
  private readonly minLevel: EventLevel;

  constructor(options: TracerOptions = {}) {
    this.minLevel = options.minLevel ?? "info";
    for (const writer of options.writers ?? []) {
      this.addWriter(writer);
    }
  }

  addWriter(writer: TraceWriter): void {
    if (!this.writers.includes(writer)) {
      this.writers.push(writer);
    }
  }

  startSpan(name: string, options?: SpanOptions): TracingContext {
    return this.open(randomUUID(), undefined, name, options);
  }

  /** @internal */
  open(
    traceId: string,
    parentSpanId: string | undefined,
    name: string,
    options?: SpanOptions,
  ): TracingContext {
    const data: SpanData = {
      traceId,
      spanId: randomUUID(),
      parentSpanId,
      name,
      type: options?.type,
      startTime: performance.now(),
      status: "ok",
      attributes: {},
      events: [],
    };
    this.writers.forEach((w) => w.onSpanStart(data));
    return new Span(data, this);
  }

  /** @internal */
  notify(kind: "end" | "update", data: SpanData): void {
    for (const writer of this.writers) {
      if (kind === "end") {
        writer.onSpanEnd(data);
      } else {
        writer.onSpanUpdate?.(data);
      }
    }
  }

  /** @internal */
  notifyEvent(data: SpanData, event: SpanEvent): void {
    this.writers.forEach((w) => w.onEvent?.(data, event));
  }

  /** @internal */
  shouldLog(level: EventLevel): boolean {
    return levelOrder[level] >= levelOrder[this.minLevel];
  }
}

class Span implements TracingContext {
  private ended = false;

  constructor(
    private readonly data: SpanData,
    private readonly tracer: Tracer,
  ) {}

  startSpan(name: string, options?: SpanOptions): TracingContext {
    return this.tracer.open(this.data.traceId, this.data.spanId, name, options);
  }

  end(status: SpanStatus = "ok"): void {
    if (this.ended) return;

    this.ended = true;
    this.data.endTime = performance.now();
    this.data.status = status;
    this.tracer.notify("end", this.data);
  }

  private addEvent(name: string, level: EventLevel, attributes?: Record<string, unknown>): void {
    if (this.ended || !this.tracer.shouldLog(level)) return;

    const event: SpanEvent = { name, timestamp: performance.now(), level, attributes };
    this.data.events.push(event);
    this.tracer.notifyEvent(this.data, event);
  }

  debug(message: string, attributes?: Record<string, unknown>): void {
    this.addEvent(message, "debug", attributes);
  }

  info(message: string, attributes?: Record<string, unknown>): void {
    this.addEvent(message, "info", attributes);
  }

  warn(message: string, attributes?: Record<string, unknown>): void {
    this.addEvent(message, "warn", attributes);
  }

  error(message: string, attributes?: Record<string, unknown>): void {
    this.addEvent(message, "error", attributes);
  }

  setAttribute(key: string, value: unknown): void {
    this.setAttributes({ [key]: value });
  }

  setAttributes(attributes: Record<string, unknown>): void {
    if (this.ended) return;

    Object.assign(this.data.attributes, attributes);
    this.tracer.notify("update", this.data);
  }
}

/**
 * Run `fn` inside a child span of `parent`. The span ends with status "error"
 * and an error event when `fn` throws; the error is rethrown unchanged.
 * Without a parent, `fn` runs with no span at all.
 */
export function traced<T>(
  parent: TracingContext | undefined,
  name: string,
  fn: (span: TracingContext | undefined) => T,
  options: SpanOptions = { type: "internal" },
): T {
  const span = parent?.startSpan(name, options);
  try {
    const result = fn(span);
    span?.end();
    return result;
  } catch (error) {
    span?.error(error instanceof Error ? error.message : String(error));
    span?.end("error");
    throw error;
  }
}
