export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class InvalidInputError extends AppError {
  constructor(message: string = 'Description must be a non-empty string') {
    super(message, 'INVALID_INPUT', 400);
    this.name = 'InvalidInputError';
  }
}

export class BlockedInputError extends AppError {
  constructor(
    public scanner: string,
    public score: number,
    public threshold: number
  ) {
    super(
      `Input blocked by scanner ${scanner} (score ${score.toFixed(2)} >= ${threshold})`,
      'BLOCKED_INPUT',
      400,
      { scanner, score, threshold }
    );
    this.name = 'BlockedInputError';
  }
}

export class TaxonomyUnavailableError extends AppError {
  constructor(message: string, public path?: string) {
    super(message, 'TAXONOMY_UNAVAILABLE', 424);
    this.name = 'TaxonomyUnavailableError';
  }
}

export class ClassificationFailedError extends AppError {
  constructor(message: string) {
    super(message, 'CLASSIFICATION_FAILED', 424);
    this.name = 'ClassificationFailedError';
  }
}

export class IncompleteResultError extends AppError {
  constructor(public missingFields: string[]) {
    super(
      `Classifier result is missing required fields: ${missingFields.join(', ')}`,
      'INCOMPLETE_RESULT',
      400,
      { missing_fields: missingFields }
    );
    this.name = 'IncompleteResultError';
  }
}

export class ScannerUnavailableError extends AppError {
  constructor(public scanner: string, message: string) {
    super(`Scanner ${scanner} unavailable: ${message}`, 'SCANNER_UNAVAILABLE', 424, { scanner });
    this.name = 'ScannerUnavailableError';
  }
}

export class ScoreNotFoundError extends AppError {
  constructor(public traceId: string, public scoreId: string) {
    super(
      `Score ${scoreId} not found on trace ${traceId}`,
      'SCORE_NOT_FOUND',
      404,
      { trace_id: traceId, score_id: scoreId }
    );
    this.name = 'ScoreNotFoundError';
  }
}

// Monitoring backend unreachable or rejected a write
export class MonitoringError extends AppError {
  constructor(message: string) {
    super(message, 'MONITORING_ERROR', 424);
    this.name = 'MonitoringError';
  }
}

export class InferenceError extends AppError {
  constructor(message: string, public backend?: string) {
    super(message, 'INFERENCE_ERROR', 424);
    this.name = 'InferenceError';
  }
}

export class ConfigError extends AppError {
  constructor(message: string, public issues: string[] = []) {
    super(message, 'CONFIG_ERROR', 500);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
