import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { ScoreRecord, ScoreValue, TraceRecord } from '../types/index.js';
import { MonitoringError, errorMessage } from '../errors.js';
import type { MonitoringBackend } from './backend.js';

export interface LangfuseBackendConfig {
  baseUrl: string;
  publicKey: string;
  secretKey: string;
}

type ScoreDataType = 'NUMERIC' | 'BOOLEAN' | 'CATEGORICAL';

const ingestionResponseSchema = z.object({
  successes: z.array(z.object({ id: z.string(), status: z.number() })).default([]),
  errors: z.array(z.object({
    id: z.string(),
    status: z.number(),
    message: z.string().optional()
  })).default([])
});

const scoreResponseSchema = z.object({
  id: z.string(),
  traceId: z.string(),
  name: z.string(),
  value: z.number().nullable().optional(),
  stringValue: z.string().nullable().optional(),
  dataType: z.enum(['NUMERIC', 'BOOLEAN', 'CATEGORICAL']),
  timestamp: z.string()
});

/**
 * Monitoring backend speaking the Langfuse public HTTP API.
 *
 * Traces and scores go through the batched ingestion endpoint, which upserts
 * by id. Scores are read back one at a time by id.
 */
export class LangfuseBackend implements MonitoringBackend {
  readonly name = 'langfuse';

  private baseUrl: string;
  private authorization: string;

  constructor(config: LangfuseBackendConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.authorization = 'Basic ' + Buffer.from(`${config.publicKey}:${config.secretKey}`).toString('base64');
  }

  async upsertTrace(trace: TraceRecord, signal?: AbortSignal): Promise<void> {
    await this.ingest('trace-create', {
      id: trace.id,
      name: trace.name,
      timestamp: trace.timestamp,
      input: trace.input,
      output: trace.output,
      tags: [trace.status],
      metadata: { ...trace.metadata, status: trace.status }
    }, signal);
  }

  async upsertScore(score: ScoreRecord, signal?: AbortSignal): Promise<void> {
    const { value, dataType } = encodeScoreValue(score.value);
    await this.ingest('score-create', {
      id: score.id,
      traceId: score.traceId,
      name: score.name,
      timestamp: score.timestamp,
      value,
      dataType
    }, signal);
  }

  async getScore(scoreId: string, signal?: AbortSignal): Promise<ScoreRecord | null> {
    const response = await this.request(`/api/public/scores/${encodeURIComponent(scoreId)}`, {
      method: 'GET',
      signal
    });

    if (response.status === 404) {
      return null;
    }
    if (!response.ok) {
      throw new MonitoringError(`Langfuse score lookup failed: ${response.status}`);
    }

    const parsed = scoreResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new MonitoringError(`Langfuse returned a malformed score: ${parsed.error.message}`);
    }

    const score = parsed.data;
    return {
      id: score.id,
      traceId: score.traceId,
      name: score.name,
      value: decodeScoreValue(score.dataType, score.value ?? null, score.stringValue ?? null),
      timestamp: score.timestamp
    };
  }

  private async ingest(type: 'trace-create' | 'score-create', body: Record<string, unknown>, signal?: AbortSignal): Promise<void> {
    const response = await this.request('/api/public/ingestion', {
      method: 'POST',
      body: JSON.stringify({
        batch: [{ id: uuidv4(), timestamp: new Date().toISOString(), type, body }]
      }),
      signal
    });

    if (!response.ok) {
      throw new MonitoringError(`Langfuse ingestion failed: ${response.status}`);
    }

    // 207 Multi-Status carries per-event failures
    const result = ingestionResponseSchema.safeParse(await response.json());
    if (!result.success) {
      throw new MonitoringError(`Langfuse returned a malformed ingestion response: ${result.error.message}`);
    }
    const [firstError] = result.data.errors;
    if (firstError) {
      throw new MonitoringError(`Langfuse rejected ${type}: ${firstError.status} ${firstError.message ?? ''}`.trim());
    }
  }

  private async request(
    path: string,
    init: { method: 'GET' | 'POST'; body?: string; signal?: AbortSignal }
  ): Promise<Response> {
    const headers: Record<string, string> = { Authorization: this.authorization };
    if (init.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    try {
      return await fetch(`${this.baseUrl}${path}`, { ...init, headers });
    } catch (error) {
      throw new MonitoringError(`Langfuse request to ${path} failed: ${errorMessage(error)}`);
    }
  }
}

export function encodeScoreValue(value: ScoreValue): { value: number | string; dataType: ScoreDataType } {
  if (typeof value === 'boolean') {
    return { value: value ? 1 : 0, dataType: 'BOOLEAN' };
  }
  if (typeof value === 'string') {
    return { value, dataType: 'CATEGORICAL' };
  }
  return { value, dataType: 'NUMERIC' };
}

function decodeScoreValue(dataType: ScoreDataType, value: number | null, stringValue: string | null): ScoreValue {
  switch (dataType) {
    case 'BOOLEAN':
      return value === 1;
    case 'CATEGORICAL':
      return stringValue ?? String(value);
    case 'NUMERIC':
      return value ?? 0;
  }
}
