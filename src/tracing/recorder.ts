import { setTimeout as sleep } from 'timers/promises';
import { v4 as uuidv4 } from 'uuid';
import type { Logger } from 'pino';
import type { ScoreRecord, ScoreValue, TraceOutcome } from '../types/index.js';
import { MonitoringError, ScoreNotFoundError, errorMessage } from '../errors.js';
import type { MonitoringBackend } from './backend.js';

export interface TraceRecorderConfig {
  // Upper bound on every backend call
  timeoutMs: number;
  // Extra reads of a score that is not there yet
  lookupRetries?: number;
  lookupRetryDelayMs?: number;
}

/**
 * Correlates a request with a trace id and scores in the monitoring backend.
 *
 * Trace and score ids are minted here rather than by the backend, so a
 * request always has a trace id to hand back even while the backend is
 * down. Writes made on the request path are best-effort: failures are
 * logged and reported through the return value, never thrown.
 */
export class TraceRecorder {
  private logger: Logger;

  constructor(
    private readonly config: TraceRecorderConfig,
    private readonly backend: MonitoringBackend,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'trace-recorder', backend: backend.name });
  }

  async beginTrace(name: string, input?: unknown): Promise<string> {
    const traceId = uuidv4();

    await this.bestEffort('begin trace', traceId, signal =>
      this.backend.upsertTrace({
        id: traceId,
        name,
        timestamp: new Date().toISOString(),
        status: 'open',
        input
      }, signal)
    );

    return traceId;
  }

  // Resolves to null when the score could not be written
  async recordScore(traceId: string, name: string, value: ScoreValue): Promise<string | null> {
    const scoreId = uuidv4();

    const recorded = await this.bestEffort('record score', traceId, signal =>
      this.backend.upsertScore({
        id: scoreId,
        traceId,
        name,
        value,
        timestamp: new Date().toISOString()
      }, signal)
    );

    return recorded ? scoreId : null;
  }

  async updateScore(traceId: string, scoreId: string, name: string, value: ScoreValue): Promise<void> {
    const existing = await this.lookupScore(scoreId);
    if (!existing || existing.traceId !== traceId || existing.name !== name) {
      throw new ScoreNotFoundError(traceId, scoreId);
    }

    await this.withTimeout(signal =>
      this.backend.upsertScore({
        id: scoreId,
        traceId,
        name,
        value,
        timestamp: new Date().toISOString()
      }, signal)
    );

    this.logger.debug({ trace_id: traceId, score_id: scoreId, name, value }, 'Score updated');
  }

  async finishTrace(traceId: string, name: string, outcome: TraceOutcome): Promise<void> {
    await this.bestEffort('finish trace', traceId, signal =>
      this.backend.upsertTrace({
        id: traceId,
        name,
        timestamp: new Date().toISOString(),
        status: outcome.status,
        output: outcome.output,
        metadata: outcome.error ? { error: outcome.error } : undefined
      }, signal)
    );
  }

  // A score written moments ago may not be readable yet on backends that ingest asynchronously
  private async lookupScore(scoreId: string): Promise<ScoreRecord | null> {
    const retries = this.config.lookupRetries ?? 0;

    for (let attempt = 0; ; attempt++) {
      const score = await this.withTimeout(signal => this.backend.getScore(scoreId, signal));
      if (score || attempt >= retries) {
        return score;
      }
      await sleep(this.config.lookupRetryDelayMs ?? 0);
    }
  }

  private async bestEffort(
    operation: string,
    traceId: string,
    call: (signal: AbortSignal) => Promise<void>
  ): Promise<boolean> {
    try {
      await this.withTimeout(call);
      return true;
    } catch (error) {
      this.logger.warn({ trace_id: traceId, err: errorMessage(error) }, `Failed to ${operation}`);
      return false;
    }
  }

  private async withTimeout<T>(call: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new MonitoringError(`Monitoring backend did not answer within ${this.config.timeoutMs}ms`));
      }, this.config.timeoutMs);
    });

    try {
      return await Promise.race([call(controller.signal), timeout]);
    } catch (error) {
      if (error instanceof MonitoringError) throw error;
      throw new MonitoringError(`Monitoring backend call failed: ${errorMessage(error)}`);
    } finally {
      clearTimeout(timer);
    }
  }
}
