import { config } from '../core/config';
import { logger } from '../core/logger';
import { PipelineResult } from '../types';
import { ExpiringMap } from '../utils/expiring-map';

export interface TraceStoreOptions {
  ttlMs: number;
  sweepIntervalMs: number;
  now: () => number;
}

/**
 * Recent pipeline results, addressable by trace id or by the session that
 * produced them (latest run wins).
 */
export class TraceStore {
  private traces: ExpiringMap<PipelineResult>;
  private latestBySession: ExpiringMap<string>;
  private sweepTimer: NodeJS.Timeout | null = null;
  private options: TraceStoreOptions;

  constructor(options: Partial<TraceStoreOptions> = {}) {
    this.options = {
      ttlMs: options.ttlMs ?? config.traces.ttlMs,
      sweepIntervalMs: options.sweepIntervalMs ?? config.traces.sweepIntervalMs,
      now: options.now ?? Date.now,
    };
    this.traces = new ExpiringMap<PipelineResult>(this.options.ttlMs, this.options.now);
    this.latestBySession = new ExpiringMap<string>(this.options.ttlMs, this.options.now);
  }

  save(result: PipelineResult): void {
    this.traces.set(result.traceId, result);
    this.latestBySession.set(result.sessionId, result.traceId);
  }

  getByTraceId(traceId: string): PipelineResult | null {
    return this.traces.get(traceId);
  }

  getLatestForSession(sessionId: string): PipelineResult | null {
    const traceId = this.latestBySession.get(sessionId);
    return traceId ? this.traces.get(traceId) : null;
  }

  forgetSession(sessionId: string): void {
    this.latestBySession.delete(sessionId);
  }

  /** Drops expired traces, read or not; returns how many were removed. */
  sweep(): number {
    const removed = this.traces.sweep();
    this.latestBySession.sweep();
    if (removed > 0) {
      logger.debug('Trace sweep', { removed, remaining: this.traces.size });
    }
    return removed;
  }

  size(): number {
    return this.traces.size;
  }

  start(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => this.sweep(), this.options.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }
}
