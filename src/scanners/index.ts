export { type Scanner, DEFAULT_POLICY, clampScore } from './scanner.js';
export { PromptInjectionScanner, scoreInjection } from './prompt-injection.js';
export { ModelInjectionScanner } from './model-injection.js';
export { RegexScanner, REDACTED, type MatchType } from './regex.js';
export { TokenLimitScanner, estimateTokens } from './token-limit.js';
export { GuardrailEvaluator } from './evaluator.js';
export { createScanner, createScanners } from './factory.js';
