export type ScoreValue = number | string | boolean;

export type TraceStatus = 'open' | 'completed' | 'blocked' | 'failed';

export interface TraceRecord {
  id: string;
  name: string;
  timestamp: string;
  status: TraceStatus;
  input?: unknown;
  output?: unknown;
  metadata?: Record<string, unknown>;
}

export interface ScoreRecord {
  id: string;
  traceId: string;
  name: string;
  value: ScoreValue;
  timestamp: string;
}

export interface TraceOutcome {
  status: Exclude<TraceStatus, 'open'>;
  output?: unknown;
  error?: { code: string; message: string };
}
