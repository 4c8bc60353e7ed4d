import type { Logger } from 'pino';
import type { ClassificationResult, ScanResult, ScannerFailurePolicy } from '../types/index.js';
import { REQUIRED_RESULT_FIELDS, classificationResultSchema } from '../types/index.js';
import type { GuardrailEvaluator } from '../scanners/index.js';
import type { TraceRecorder } from '../tracing/index.js';
import type { Classifier, TaxonomyLoader } from '../classifier/index.js';
import {
  AppError,
  BlockedInputError,
  ClassificationFailedError,
  IncompleteResultError,
  InvalidInputError,
  ScannerUnavailableError,
  errorMessage
} from '../errors.js';

export const TRACE_NAME = 'classify';
export const CONVERTED_SCORE = 'converted';

export interface ClassificationGateOptions {
  // Issue a converted=false score with every successful classification
  trackConversion: boolean;
  onScannerUnavailable: ScannerFailurePolicy;
}

export interface ClassificationOutcome {
  traceId: string;
  // null: tracking is on but the score could not be recorded
  scoreId?: string | null;
  result: ClassificationResult;
}

export interface ClassificationGateDeps {
  evaluator: GuardrailEvaluator;
  recorder: TraceRecorder;
  classifier: Classifier;
  taxonomy: Pick<TaxonomyLoader, 'load'>;
  logger: Logger;
}

/**
 * Runs one classification request: guardrail scan, then the classifier.
 *
 * Instrumentation is explicit around each step. Recording calls never
 * throw, so a monitoring outage cannot change whether input is blocked or
 * classified.
 */
export class ClassificationGate {
  private logger: Logger;

  constructor(
    private readonly deps: ClassificationGateDeps,
    private readonly options: ClassificationGateOptions = { trackConversion: true, onScannerUnavailable: 'fail_closed' }
  ) {
    this.logger = deps.logger.child({ component: 'classification-gate' });
  }

  async handle(description: string): Promise<ClassificationOutcome> {
    if (description.trim().length === 0) {
      throw new InvalidInputError();
    }

    const { recorder } = this.deps;
    const traceId = await recorder.beginTrace(TRACE_NAME, { description });
    const log = this.logger.child({ trace_id: traceId });

    const scan = await this.scanInput(traceId, description, log);
    if (scan) {
      for (const [name, score] of Object.entries(scan.scores)) {
        await recorder.recordScore(traceId, name, score);
      }

      const decision = this.deps.evaluator.decide(scan);
      if (!decision.accepted) {
        const blocked = new BlockedInputError(decision.scanner, decision.score, decision.threshold);
        await recorder.finishTrace(traceId, TRACE_NAME, {
          status: 'blocked',
          error: { code: blocked.code, message: blocked.message }
        });
        log.info({ scanner: decision.scanner, score: decision.score }, 'Input blocked');
        throw blocked;
      }
    }

    const result = await this.classify(traceId, scan?.sanitizedText ?? description);

    let scoreId: string | null | undefined;
    if (this.options.trackConversion) {
      scoreId = await recorder.recordScore(traceId, CONVERTED_SCORE, false);
    }

    await recorder.finishTrace(traceId, TRACE_NAME, { status: 'completed', output: result });
    log.info({ category_id: result.id, score_id: scoreId }, 'Description classified');

    return this.options.trackConversion ? { traceId, scoreId, result } : { traceId, result };
  }

  private async scanInput(traceId: string, text: string, log: Logger): Promise<ScanResult | null> {
    try {
      return await this.deps.evaluator.scan(text);
    } catch (error) {
      if (error instanceof ScannerUnavailableError && this.options.onScannerUnavailable === 'fail_open') {
        log.warn({ scanner: error.scanner, err: error.message }, 'Scanner unavailable, continuing unscanned');
        return null;
      }

      await this.deps.recorder.finishTrace(traceId, TRACE_NAME, {
        status: 'failed',
        error: { code: 'SCANNER_UNAVAILABLE', message: errorMessage(error) }
      });
      throw error;
    }
  }

  private async classify(traceId: string, text: string): Promise<ClassificationResult> {
    try {
      const taxonomy = await this.deps.taxonomy.load();
      const raw = await this.deps.classifier.classify(text, taxonomy);
      return validateResult(raw);
    } catch (error) {
      const failure = error instanceof AppError
        ? error
        : new ClassificationFailedError(errorMessage(error));

      await this.deps.recorder.finishTrace(traceId, TRACE_NAME, {
        status: 'failed',
        error: { code: failure.code, message: failure.message }
      });
      this.logger.warn({ trace_id: traceId, code: failure.code }, 'Classification failed');
      throw failure;
    }
  }
}

export function validateResult(raw: unknown): ClassificationResult {
  const parsed = classificationResultSchema.safeParse(raw);
  if (parsed.success) {
    return parsed.data;
  }

  const invalid = new Set<string>();
  for (const issue of parsed.error.issues) {
    const [field] = issue.path;
    if (field === undefined) {
      // Not an object at all
      REQUIRED_RESULT_FIELDS.forEach(name => invalid.add(name));
    } else {
      invalid.add(String(field));
    }
  }

  throw new IncompleteResultError(REQUIRED_RESULT_FIELDS.filter(name => invalid.has(name)));
}
