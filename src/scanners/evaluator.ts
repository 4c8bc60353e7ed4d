import type { GuardrailDecision, ScanResult } from '../types/index.js';
import { ScannerUnavailableError, errorMessage } from '../errors.js';
import { clampScore, type Scanner } from './scanner.js';

export class GuardrailEvaluator {
  constructor(private readonly scanners: readonly Scanner[]) {
    const names = new Set<string>();
    for (const scanner of scanners) {
      if (names.has(scanner.name)) {
        throw new Error(`Duplicate scanner name: ${scanner.name}`);
      }
      names.add(scanner.name);
    }
  }

  // Every score is returned, not just the verdict, so callers can record them all
  async scan(text: string): Promise<ScanResult> {
    const scores: Record<string, number> = {};
    let sanitizedText = text;

    for (const scanner of this.scanners) {
      let score: number;
      try {
        score = await scanner.evaluate(text);
      } catch (error) {
        if (error instanceof ScannerUnavailableError) throw error;
        throw new ScannerUnavailableError(scanner.name, errorMessage(error));
      }

      scores[scanner.name] = clampScore(score);
      if (scanner.sanitize) {
        sanitizedText = scanner.sanitize(sanitizedText);
      }
    }

    return { scores, sanitizedText };
  }

  decide(result: ScanResult): GuardrailDecision {
    for (const scanner of this.scanners) {
      if (!scanner.policy.block) continue;

      const score = result.scores[scanner.name];
      if (score !== undefined && score >= scanner.policy.threshold) {
        return {
          accepted: false,
          scanner: scanner.name,
          score,
          threshold: scanner.policy.threshold
        };
      }
    }

    return { accepted: true };
  }

  describe(): { name: string; kind: string; threshold: number; block: boolean }[] {
    return this.scanners.map(scanner => ({
      name: scanner.name,
      kind: scanner.kind,
      threshold: scanner.policy.threshold,
      block: scanner.policy.block
    }));
  }
}
