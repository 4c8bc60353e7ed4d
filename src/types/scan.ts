export type ScannerKind = 'prompt_injection' | 'prompt_injection_model' | 'regex' | 'token_limit';

export interface ScannerPolicy {
  // Score at or above which the scanner rejects, in [0, 1]
  threshold: number;
  // Non-blocking scanners only annotate the trace
  block: boolean;
}

export interface ScanResult {
  scores: Record<string, number>;
  sanitizedText: string;
}

export type GuardrailDecision =
  | { accepted: true }
  | {
      accepted: false;
      scanner: string;
      score: number;
      threshold: number;
    };

export type ScannerFailurePolicy = 'fail_closed' | 'fail_open';
