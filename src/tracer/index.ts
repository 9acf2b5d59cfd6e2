export { Tracer, traced } from "./tracer.js";
export type { TracerOptions } from "./tracer.js";
export type {
  EventLevel,
  SpanData,
  SpanEvent,
  SpanOptions,
  SpanStatus,
  SpanType,
  TraceWriter,
  TracingContext,
} from "./types.js";
export { SimpleWriter } from "./writers/simple.js";
export type { SimpleWriterOptions } from "./writers/simple.js";
