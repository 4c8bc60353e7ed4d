import type { ScannerKind, ScannerPolicy } from '../types/index.js';

export interface Scanner {
  readonly name: string;
  readonly kind: ScannerKind;
  readonly policy: ScannerPolicy;

  // Risk score in [0, 1]; deterministic for a given input and model version
  evaluate(text: string): Promise<number>;

  // Present on scanners that rewrite the input they pass on (redaction)
  sanitize?(text: string): string;
}

export const DEFAULT_POLICY: ScannerPolicy = { threshold: 0.5, block: true };

export function clampScore(score: number): number {
  if (Number.isNaN(score)) return 0;
  return Math.min(1, Math.max(0, score));
}
