export type SpanStatus = "ok" | "error";

export type EventLevel = "debug" | "info" | "warn" | "error";

// Open string for span types - these are conventions, not enforced
// Common types: "io", "env", "internal"
export type SpanType = string;

export interface SpanEvent {
  name: string;
  timestamp: number;
  level: EventLevel;
  attributes?: Record<string, unknown>;
}

export interface SpanData {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
  name: string;
  type?: SpanType;
  startTime: number;
  endTime?: number;
  status: SpanStatus;
  attributes: Record<string, unknown>;
  events: SpanEvent[];
}

export interface SpanOptions {
  type?: SpanType;
}

export interface TraceWriter {
  onSpanStart(span: SpanData): void;
  onSpanUpdate?(span: SpanData): void;
  onSpanEnd(span: SpanData): void;
  onEvent?(span: SpanData, event: SpanEvent): void;
}

/**
 * Tracing context for a span. Created by Tracer.startSpan().
 * Can create child spans and log events within the span's scope.
 */
export interface TracingContext {
  startSpan(name: string, options?: SpanOptions): TracingContext;
  end(status?: SpanStatus): void;

  debug(message: string, attributes?: Record<string, unknown>): void;
  info(message: string, attributes?: Record<string, unknown>): void;
  warn(message: string, attributes?: Record<string, unknown>): void;
  error(message: string, attributes?: Record<string, unknown>): void;

  setAttribute(key: string, value: unknown): void;
  setAttributes(attributes: Record<string, unknown>): void;
}
