export type {
  ScannerKind,
  ScannerPolicy,
  ScanResult,
  GuardrailDecision,
  ScannerFailurePolicy
} from './scan.js';
export type { ScoreValue, TraceStatus, TraceRecord, ScoreRecord, TraceOutcome } from './trace.js';
export {
  REQUIRED_RESULT_FIELDS,
  classificationResultSchema,
  type ClassificationResult,
  type TaxonomyCategory,
  type Taxonomy,
  type ClassifyRequest,
  type ClassifyResponse,
  type ConvertRequest,
  type ErrorResponse
} from './classification.js';
