import type { ScannerPolicy } from '../types/index.js';
import { DEFAULT_POLICY, type Scanner } from './scanner.js';

export type MatchType = 'search' | 'full';

export interface RegexScannerOptions {
  name?: string;
  patterns: string[];
  // true: a match is a risk. false: the input must match one of the patterns
  isBlocked?: boolean;
  matchType?: MatchType;
  redact?: boolean;
  policy?: Partial<ScannerPolicy>;
}

export const REDACTED = '[REDACTED]';

export class RegexScanner implements Scanner {
  readonly kind = 'regex' as const;
  readonly name: string;
  readonly policy: ScannerPolicy;

  private patterns: RegExp[];
  private isBlocked: boolean;
  private matchType: MatchType;
  private redact: boolean;

  constructor(options: RegexScannerOptions) {
    if (options.patterns.length === 0) {
      throw new Error('RegexScanner requires at least one pattern');
    }

    this.name = options.name ?? 'regex';
    this.policy = { ...DEFAULT_POLICY, ...options.policy };
    this.isBlocked = options.isBlocked ?? true;
    this.matchType = options.matchType ?? 'search';
    this.redact = options.redact ?? false;

    this.patterns = options.patterns.map(source =>
      this.matchType === 'full' ? new RegExp(`^(?:${source})$`) : new RegExp(source)
    );
  }

  async evaluate(text: string): Promise<number> {
    const matched = this.patterns.some(pattern => pattern.test(text));

    if (this.isBlocked) {
      return matched ? 1 : 0;
    }
    return matched ? 0 : 1;
  }

  sanitize(text: string): string {
    // Allowed patterns and full matches are never partially redacted
    if (!this.redact || !this.isBlocked || this.matchType === 'full') {
      return text;
    }

    return this.patterns.reduce(
      // Zero-length matches stay as they are
      (current, pattern) => current.replace(
        new RegExp(pattern.source, withGlobal(pattern.flags)),
        match => (match.length > 0 ? REDACTED : match)
      ),
      text
    );
  }
}

function withGlobal(flags: string): string {
  return flags.includes('g') ? flags : flags + 'g';
}
