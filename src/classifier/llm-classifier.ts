import type { Taxonomy } from '../types/index.js';
import type { InferenceClient } from '../inference/index.js';
import { extractJsonObject } from '../inference/index.js';
import { ClassificationFailedError, errorMessage } from '../errors.js';
import { CLASSIFICATION_SYSTEM_PROMPT, buildClassificationPrompt } from './prompt.js';

// Returns the model's raw object; the gate validates the fields
export interface Classifier {
  classify(description: string, taxonomy: Taxonomy): Promise<unknown>;
}

export interface LlmClassifierOptions {
  backend?: string;
  maxTokens?: number;
}

export class LlmClassifier implements Classifier {
  constructor(
    private inference: InferenceClient,
    private options: LlmClassifierOptions = {}
  ) {}

  async classify(description: string, taxonomy: Taxonomy): Promise<unknown> {
    let output: string;
    try {
      const response = await this.inference.infer(
        {
          input: buildClassificationPrompt(description, taxonomy),
          systemPrompt: CLASSIFICATION_SYSTEM_PROMPT,
          maxTokens: this.options.maxTokens ?? 512,
          temperature: 0,
          json: true
        },
        this.options.backend
      );
      output = response.output;
    } catch (error) {
      throw new ClassificationFailedError(`Classifier call failed: ${errorMessage(error)}`);
    }

    try {
      return extractJsonObject(output);
    } catch (error) {
      throw new ClassificationFailedError(`Classifier returned no JSON object: ${errorMessage(error)}`);
    }
  }
}
