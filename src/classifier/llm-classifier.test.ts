import { describe, it, expect, vi } from 'vitest';
import { LlmClassifier } from './llm-classifier.js';
import { CLASSIFICATION_SYSTEM_PROMPT } from './prompt.js';
import type { Taxonomy } from '../types/index.js';
import { ClassificationFailedError } from '../errors.js';

const TAXONOMY: Taxonomy = {
  version: '1',
  categories: [
    { id: '1', parent_id: null, name: 'Travel', tier_1: 'Travel', tier_2: null, tier_3: null, tier_4: null }
  ]
};

function stubInference(output: string) {
  return {
    infer: vi.fn(async () => ({ output, model: 'test-model', latencyMs: 5 }))
  };
}

describe('LlmClassifier', () => {
  it('returns the JSON object from a fenced reply', async () => {
    const inference = stubInference('```json\n{"id": "1", "name": "Travel"}\n```');
    const classifier = new LlmClassifier(inference);

    expect(await classifier.classify('A trip abroad', TAXONOMY)).toEqual({ id: '1', name: 'Travel' });
  });

  it('sends the classification prompt to the configured backend', async () => {
    const inference = stubInference('{}');
    const classifier = new LlmClassifier(inference, { backend: 'local', maxTokens: 256 });

    await classifier.classify('A trip abroad', TAXONOMY);

    expect(inference.infer).toHaveBeenCalledWith(
      expect.objectContaining({
        systemPrompt: CLASSIFICATION_SYSTEM_PROMPT,
        maxTokens: 256,
        json: true,
        input: expect.stringContaining('Description:\nA trip abroad')
      }),
      'local'
    );
  });

  it('fails with ClassificationFailedError when the model call fails', async () => {
    const classifier = new LlmClassifier({
      infer: vi.fn(async () => {
        throw new Error('overloaded');
      })
    });

    await expect(classifier.classify('x', TAXONOMY)).rejects.toThrow('Classifier call failed: overloaded');
  });

  it('fails with ClassificationFailedError when the reply has no JSON', async () => {
    const classifier = new LlmClassifier(stubInference('Sorry, I cannot help with that.'));
    await expect(classifier.classify('x', TAXONOMY)).rejects.toBeInstanceOf(ClassificationFailedError);
  });
});
