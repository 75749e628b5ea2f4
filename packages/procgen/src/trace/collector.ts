/**
 * Trace collector implementation for debugging and observability.
 */

import type { TraceCollector, TraceEvent, TraceEventType } from "./types";

const DEV_MODE = process.env.NODE_ENV !== "production";

/**
 * Records every event in memory
 */
export class DefaultTraceCollector implements TraceCollector {
  readonly enabled: boolean;
  private readonly events: TraceEvent[] = [];
  private readonly startTime: number;

  constructor(enabled: boolean = true) {
    this.enabled = enabled;
    this.startTime = performance.now();
  }

  private emit(scope: string, eventType: TraceEventType, data?: unknown): void {
    if (!this.enabled) return;

    this.events.push({
      timestamp: performance.now() - this.startTime,
      scope,
      eventType,
      data,
    });
  }

  start(scope: string): void {
    this.emit(scope, "start");
  }

  end(scope: string, durationMs: number): void {
    this.emit(scope, "end", { durationMs });
  }

  decision(
    scope: string,
    question: string,
    options: readonly unknown[],
    chosen: unknown,
    reason: string,
  ): void {
    this.emit(scope, "decision", { question, options, chosen, reason });
  }

  warning(scope: string, message: string): void {
    this.emit(scope, "warning", { message });
  }

  getEvents(): readonly TraceEvent[] {
    return this.events;
  }

  clear(): void {
    this.events.length = 0;
  }
}

/**
 * No-op trace collector for production
 */
export class NoOpTraceCollector implements TraceCollector {
  readonly enabled = false;

  start(_scope: string): void {}
  end(_scope: string, _durationMs: number): void {}
  decision(
    _scope: string,
    _question: string,
    _options: readonly unknown[],
    _chosen: unknown,
    _reason: string,
  ): void {}
  warning(_scope: string, _message: string): void {}
  getEvents(): readonly TraceEvent[] {
    return [];
  }
  clear(): void {}
}

export function createTraceCollector(enabled: boolean): TraceCollector {
  return enabled ? new DefaultTraceCollector(true) : new NoOpTraceCollector();
}

/**
 * Run `fn` between a start and an end event carrying its duration
 */
export function traced<R>(trace: TraceCollector, scope: string, fn: () => R): R {
  trace.start(scope);
  const startedAt = performance.now();
  const result = fn();
  trace.end(scope, performance.now() - startedAt);
  return result;
}

/**
 * Record a warning, echoing it to the console outside production
 */
export function warnGeneration(
  trace: TraceCollector,
  scope: string,
  message: string,
): void {
  trace.warning(scope, message);
  if (DEV_MODE) {
    console.warn(`[${scope}] ${message}`);
  }
}
