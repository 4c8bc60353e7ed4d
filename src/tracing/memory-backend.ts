import type { ScoreRecord, TraceRecord } from '../types/index.js';
import type { MonitoringBackend } from './backend.js';

export interface InMemoryMonitoringBackendOptions {
  maxTraces?: number;
}

// Process-local backend for development and tests
export class InMemoryMonitoringBackend implements MonitoringBackend {
  readonly name = 'memory';

  private traces = new Map<string, TraceRecord>();
  private scores = new Map<string, ScoreRecord>();
  private maxTraces: number;

  constructor(options: InMemoryMonitoringBackendOptions = {}) {
    this.maxTraces = options.maxTraces ?? 10000;
  }

  async upsertTrace(trace: TraceRecord): Promise<void> {
    const existing = this.traces.get(trace.id);
    if (!existing) {
      this.traces.set(trace.id, { ...trace });
      this.evictOldest();
      return;
    }

    // Fields left out of an update keep their earlier value
    this.traces.set(trace.id, {
      ...existing,
      status: trace.status,
      input: trace.input ?? existing.input,
      output: trace.output ?? existing.output,
      metadata: { ...existing.metadata, ...trace.metadata }
    });
  }

  async upsertScore(score: ScoreRecord): Promise<void> {
    this.scores.set(score.id, { ...score });
  }

  async getScore(scoreId: string): Promise<ScoreRecord | null> {
    const score = this.scores.get(scoreId);
    return score ? { ...score } : null;
  }

  // Map iteration follows insertion order, so the first key is the oldest trace
  private evictOldest(): void {
    while (this.traces.size > this.maxTraces) {
      const [oldest] = this.traces.keys();
      if (oldest === undefined) return;

      this.traces.delete(oldest);
      for (const [scoreId, score] of this.scores) {
        if (score.traceId === oldest) this.scores.delete(scoreId);
      }
    }
  }

  getTrace(traceId: string): TraceRecord | undefined {
    return this.traces.get(traceId);
  }

  scoresForTrace(traceId: string): ScoreRecord[] {
    return Array.from(this.scores.values()).filter(score => score.traceId === traceId);
  }

  traceIds(): string[] {
    return Array.from(this.traces.keys());
  }

  get traceCount(): number {
    return this.traces.size;
  }
}
