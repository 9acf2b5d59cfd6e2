import chalk from "chalk";
import { levelOrder } from "../tracer.js";
import type { EventLevel, SpanData, SpanEvent, TraceWriter } from "../types.js";

const levelColors: Record<EventLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export interface SimpleWriterOptions {
  /** Minimum event level to display (default: "info") */
  minLevel?: EventLevel;
  /** Show internal spans such as openx acquisitions (default: false) */
  showInternal?: boolean;
  /** Show timestamps (default: true) */
  showTimestamp?: boolean;
  /** Show duration on span end (default: true) */
  showDuration?: boolean;
  /** Color level labels (default: false) */
  color?: boolean;
  /** Custom output function (default: console.log) */
  output?: (line: string) => void;
}

export class SimpleWriter implements TraceWriter {
  private minLevel: EventLevel;
  private showInternal: boolean;
  private showTimestamp: boolean;
  private showDuration: boolean;
  private color: boolean;
  private output: (line: string) => void;

  // Track span hierarchy for depth calculation and event bubbling. A span is
  // dropped once it has ended and none of its children is still open.
  private spans: Map<string, SpanData> = new Map();
  private visibleDepths: Map<string, number> = new Map();
  private openChildren: Map<string, number> = new Map();

  constructor(options: SimpleWriterOptions = {}) {
    this.minLevel = options.minLevel ?? "info";
    this.showInternal = options.showInternal ?? false;
    this.showTimestamp = options.showTimestamp ?? true;
    this.showDuration = options.showDuration ?? true;
    this.color = options.color ?? false;
    this.output = options.output ?? console.log;
  }

  private isSpanVisible(span: SpanData): boolean {
    return span.type !== "internal" || this.showInternal;
  }

  /**
   * Nearest visible ancestor of a span, or null at root level.
   */
  private findVisibleAncestor(span: SpanData): SpanData | null {
    let currentId = span.parentSpanId;
    while (currentId) {
      const parent = this.spans.get(currentId);
      if (!parent) return null;
      if (this.isSpanVisible(parent)) return parent;
      currentId = parent.parentSpanId;
    }
    return null;
  }

  private depthOf(span: SpanData): number {
    if (this.isSpanVisible(span)) {
      return this.visibleDepths.get(span.spanId) ?? 0;
    }
    const ancestor = this.findVisibleAncestor(span);
    return ancestor ? (this.visibleDepths.get(ancestor.spanId) ?? 0) : 0;
  }

  /** Number of spans still held for hierarchy lookups. */
  get trackedSpans(): number {
    return this.spans.size;
  }

  private release(span: SpanData): void {
    let current: SpanData | undefined = span;
    while (current && current.endTime !== undefined && !this.openChildren.get(current.spanId)) {
      this.spans.delete(current.spanId);
      this.visibleDepths.delete(current.spanId);
      this.openChildren.delete(current.spanId);

      const parentId = current.parentSpanId;
      if (parentId === undefined || !this.spans.has(parentId)) return;
      const remaining = (this.openChildren.get(parentId) ?? 1) - 1;
      this.openChildren.set(parentId, remaining);
      current = this.spans.get(parentId);
    }
  }

  private formatTimestamp(): string {
    if (!this.showTimestamp) return "";
    const now = new Date();
    const time = now.toTimeString().slice(0, 8);
    const ms = now.getMilliseconds().toString().padStart(3, "0");
    return `[${time}.${ms}] `;
  }

  private formatDuration(span: SpanData): string {
    if (!this.showDuration || span.endTime === undefined) return "";
    const duration = span.endTime - span.startTime;
    if (duration < 1000) {
      return ` (${Math.round(duration)}ms)`;
    }
    return ` (${(duration / 1000).toFixed(2)}s)`;
  }

  private formatSpanName(span: SpanData): string {
    return span.type ? `[${span.type}] ${span.name}` : span.name;
  }

  private formatLevel(level: EventLevel): string {
    const label = level.toUpperCase().padEnd(5);
    return this.color ? levelColors[level](label) : label;
  }

  onSpanStart(span: SpanData): void {
    this.spans.set(span.spanId, span);
    if (span.parentSpanId !== undefined && this.spans.has(span.parentSpanId)) {
      this.openChildren.set(span.parentSpanId, (this.openChildren.get(span.parentSpanId) ?? 0) + 1);
    }
    if (!this.isSpanVisible(span)) return;

    const ancestor = this.findVisibleAncestor(span);
    const depth = ancestor ? (this.visibleDepths.get(ancestor.spanId) ?? 0) + 1 : 0;
    this.visibleDepths.set(span.spanId, depth);

    const indent = "  ".repeat(depth);
    this.output(`${this.formatTimestamp()}${indent}START ${this.formatSpanName(span)}`);
  }

  onSpanEnd(span: SpanData): void {
    if (this.isSpanVisible(span)) {
      const indent = "  ".repeat(this.depthOf(span));
      const duration = this.formatDuration(span);
      const status = span.status === "error" ? " [ERROR]" : "";
      this.output(
        `${this.formatTimestamp()}${indent}END   ${this.formatSpanName(span)}${duration}${status}`,
      );
    }
    this.release(span);
  }

  onSpanUpdate(span: SpanData): void {
    if (this.spans.has(span.spanId)) {
      this.spans.set(span.spanId, span);
    }
  }

  onEvent(span: SpanData, event: SpanEvent): void {
    if (levelOrder[event.level] < levelOrder[this.minLevel]) return;

    const indent = "  ".repeat(this.depthOf(span) + 1);
    let line = `${this.formatTimestamp()}${indent}${this.formatLevel(event.level)} ${event.name}`;

    const attrs = Object.entries(event.attributes ?? {});
    if (attrs.length > 0) {
      line += " " + attrs.map(([k, v]) => `${k}=${JSON.stringify(v)}`).join(" ");
    }

    this.output(line);
  }
}
