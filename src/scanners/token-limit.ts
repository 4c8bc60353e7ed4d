import type { ScannerPolicy } from '../types/index.js';
import { DEFAULT_POLICY, type Scanner } from './scanner.js';

// Rough token estimation (4 chars per token average for English)
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

export interface TokenLimitScannerOptions {
  name?: string;
  limit: number;
  policy?: Partial<ScannerPolicy>;
}

export class TokenLimitScanner implements Scanner {
  readonly kind = 'token_limit' as const;
  readonly name: string;
  readonly policy: ScannerPolicy;

  private limit: number;

  constructor(options: TokenLimitScannerOptions) {
    this.name = options.name ?? 'token_limit';
    this.policy = { ...DEFAULT_POLICY, ...options.policy };
    this.limit = options.limit;
  }

  async evaluate(text: string): Promise<number> {
    return estimateTokens(text) > this.limit ? 1 : 0;
  }
}
