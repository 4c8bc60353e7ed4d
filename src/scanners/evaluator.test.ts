import { describe, it, expect, vi } from 'vitest';
import { GuardrailEvaluator } from './evaluator.js';
import { RegexScanner } from './regex.js';
import type { Scanner } from './scanner.js';
import type { ScannerPolicy } from '../types/index.js';
import { ScannerUnavailableError } from '../errors.js';

function fakeScanner(name: string, score: number, policy: Partial<ScannerPolicy> = {}): Scanner {
  return {
    name,
    kind: 'prompt_injection',
    policy: { threshold: 0.5, block: true, ...policy },
    evaluate: vi.fn(async () => score)
  };
}

describe('GuardrailEvaluator.scan', () => {
  it('returns every scanner score in configured order', async () => {
    const evaluator = new GuardrailEvaluator([
      fakeScanner('b', 0.2),
      fakeScanner('a', 0.7, { block: false })
    ]);

    const result = await evaluator.scan('text');

    expect(Object.keys(result.scores)).toEqual(['b', 'a']);
    expect(result.scores).toEqual({ b: 0.2, a: 0.7 });
    expect(result.sanitizedText).toBe('text');
  });

  it('clamps scores into [0, 1]', async () => {
    const evaluator = new GuardrailEvaluator([fakeScanner('high', 1.7), fakeScanner('low', -0.2)]);
    const result = await evaluator.scan('text');
    expect(result.scores).toEqual({ high: 1, low: 0 });
  });

  it('wraps a scanner failure in ScannerUnavailableError and stops', async () => {
    const broken: Scanner = {
      ...fakeScanner('broken', 0),
      evaluate: vi.fn(async () => {
        throw new Error('model not loaded');
      })
    };
    const after = fakeScanner('after', 0);
    const evaluator = new GuardrailEvaluator([broken, after]);

    const scan = evaluator.scan('text');

    await expect(scan).rejects.toBeInstanceOf(ScannerUnavailableError);
    await expect(scan).rejects.toMatchObject({
      scanner: 'broken',
      message: 'Scanner broken unavailable: model not loaded'
    });
    expect(after.evaluate).not.toHaveBeenCalled();
  });

  it('passes the text through every sanitizing scanner', async () => {
    const evaluator = new GuardrailEvaluator([
      new RegexScanner({ name: 'keys', patterns: ['sk-[a-z]+'], redact: true, policy: { block: false } }),
      new RegexScanner({ name: 'phones', patterns: ['\\d{3}-\\d{4}'], redact: true, policy: { block: false } })
    ]);

    const result = await evaluator.scan('call 555-1234 with sk-abc');

    expect(result.sanitizedText).toBe('call [REDACTED] with [REDACTED]');
    expect(result.scores).toEqual({ keys: 1, phones: 1 });
  });

  it('refuses duplicate scanner names', () => {
    expect(() => new GuardrailEvaluator([fakeScanner('x', 0), fakeScanner('x', 0)]))
      .toThrow('Duplicate scanner name: x');
  });
});

describe('GuardrailEvaluator.decide', () => {
  it('rejects when a blocking scanner reaches its threshold', () => {
    const evaluator = new GuardrailEvaluator([fakeScanner('pi', 0, { threshold: 0.5 })]);
    const decision = evaluator.decide({ scores: { pi: 0.5 }, sanitizedText: 't' });
    expect(decision).toEqual({ accepted: false, scanner: 'pi', score: 0.5, threshold: 0.5 });
  });

  it('accepts scores below the threshold', () => {
    const evaluator = new GuardrailEvaluator([fakeScanner('pi', 0, { threshold: 0.5 })]);
    expect(evaluator.decide({ scores: { pi: 0.49 }, sanitizedText: 't' })).toEqual({ accepted: true });
  });

  it('ignores non-blocking scanners whatever their score', () => {
    const evaluator = new GuardrailEvaluator([fakeScanner('regex', 0, { block: false })]);
    expect(evaluator.decide({ scores: { regex: 1 }, sanitizedText: 't' })).toEqual({ accepted: true });
  });

  it('reports the first blocking scanner in order', () => {
    const evaluator = new GuardrailEvaluator([
      fakeScanner('first', 0, { threshold: 0.9 }),
      fakeScanner('second', 0, { threshold: 0.3 }),
      fakeScanner('third', 0, { threshold: 0.1 })
    ]);
    const decision = evaluator.decide({ scores: { first: 0.5, second: 0.4, third: 0.9 }, sanitizedText: 't' });
    expect(decision).toEqual({ accepted: false, scanner: 'second', score: 0.4, threshold: 0.3 });
  });

  it('describes its scanners for the health endpoint', () => {
    const evaluator = new GuardrailEvaluator([fakeScanner('pi', 0, { threshold: 0.6, block: false })]);
    expect(evaluator.describe()).toEqual([
      { name: 'pi', kind: 'prompt_injection', threshold: 0.6, block: false }
    ]);
  });
});
