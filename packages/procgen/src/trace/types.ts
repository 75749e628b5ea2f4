/**
 * Trace event types for generation debugging.
 */

export type TraceEventType = "start" | "end" | "decision" | "warning";

export interface TraceEvent {
  /** Milliseconds since the collector was created */
  readonly timestamp: number;
  /** Generator phase that emitted the event, e.g. "region-growth.grow" */
  readonly scope: string;
  readonly eventType: TraceEventType;
  readonly data?: unknown;
}

/**
 * Receives generation events. Generators call it unconditionally; a
 * disabled collector drops everything.
 */
export interface TraceCollector {
  readonly enabled: boolean;
  start(scope: string): void;
  end(scope: string, durationMs: number): void;
  decision(
    scope: string,
    question: string,
    options: readonly unknown[],
    chosen: unknown,
    reason: string,
  ): void;
  warning(scope: string, message: string): void;
  getEvents(): readonly TraceEvent[];
  clear(): void;
}
