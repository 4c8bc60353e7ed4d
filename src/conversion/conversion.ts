import type { Logger } from 'pino';
import type { TraceRecorder } from '../tracing/index.js';
import { InvalidInputError } from '../errors.js';
import { CONVERTED_SCORE } from '../gate/index.js';

// Marks a classification as acted upon, any time after it was returned
export class ConversionCallback {
  private logger: Logger;

  constructor(private readonly recorder: TraceRecorder, logger: Logger) {
    this.logger = logger.child({ component: 'conversion' });
  }

  async convert(traceId: string, scoreId: string): Promise<true> {
    if (traceId.trim().length === 0 || scoreId.trim().length === 0) {
      throw new InvalidInputError('trace_id and score_id must be non-empty strings');
    }

    await this.recorder.updateScore(traceId, scoreId, CONVERTED_SCORE, true);
    this.logger.info({ trace_id: traceId, score_id: scoreId }, 'Conversion recorded');
    return true;
  }
}
