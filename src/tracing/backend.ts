import type { ScoreRecord, TraceRecord } from '../types/index.js';

/**
 * The external monitoring service as the recorder sees it.
 *
 * Writes are upserts keyed by id, so repeating one is harmless. Every call
 * takes an AbortSignal so the recorder can bound how long it waits.
 */
export interface MonitoringBackend {
  readonly name: string;
  upsertTrace(trace: TraceRecord, signal?: AbortSignal): Promise<void>;
  upsertScore(score: ScoreRecord, signal?: AbortSignal): Promise<void>;
  // null when the backend has no score with that id
  getScore(scoreId: string, signal?: AbortSignal): Promise<ScoreRecord | null>;
}
