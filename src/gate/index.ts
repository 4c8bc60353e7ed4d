export {
  ClassificationGate,
  validateResult,
  TRACE_NAME,
  CONVERTED_SCORE,
  type ClassificationGateOptions,
  type ClassificationGateDeps,
  type ClassificationOutcome
} from './classification-gate.js';
