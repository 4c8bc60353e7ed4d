import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import { InferenceError, errorMessage } from '../errors.js';

export interface InferenceBackend {
  name: string;
  type: 'anthropic' | 'ollama';
  model: string;
  baseUrl?: string;
}

export interface InferenceRequest {
  input: string;
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
  // Ask the backend for a bare JSON reply where it supports one
  json?: boolean;
}

export interface InferenceResponse {
  output: string;
  model: string;
  tokensUsed?: number;
  latencyMs: number;
}

// What scanners and classifiers depend on; InferenceRouter is the production one
export interface InferenceClient {
  infer(request: InferenceRequest, backendName?: string): Promise<InferenceResponse>;
}

const ollamaResponseSchema = z.object({
  response: z.string(),
  eval_count: z.number().optional()
});

export class InferenceRouter implements InferenceClient {
  private backends: Map<string, InferenceBackend> = new Map();
  private anthropic?: Anthropic;
  private defaultBackend: string;

  constructor(backends: InferenceBackend[], defaultBackend: string, anthropic?: Anthropic) {
    for (const backend of backends) {
      this.backends.set(backend.name, backend);

      if (backend.type === 'anthropic' && !this.anthropic) {
        this.anthropic = anthropic ?? new Anthropic();
      }
    }

    this.defaultBackend = defaultBackend;
  }

  async infer(request: InferenceRequest, backendName?: string): Promise<InferenceResponse> {
    const name = backendName || this.defaultBackend;
    const backend = this.backends.get(name);
    if (!backend) {
      throw new InferenceError(`Backend ${name} not configured`, name);
    }

    const startTime = Date.now();

    try {
      switch (backend.type) {
        case 'anthropic':
          return await this.inferAnthropic(request, backend, startTime);

        case 'ollama':
          return await this.inferOllama(request, backend, startTime);
      }
    } catch (error) {
      if (error instanceof InferenceError) throw error;
      throw new InferenceError(`${backend.name} inference failed: ${errorMessage(error)}`, backend.name);
    }
  }

  private async inferAnthropic(
    request: InferenceRequest,
    backend: InferenceBackend,
    startTime: number
  ): Promise<InferenceResponse> {
    if (!this.anthropic) {
      throw new InferenceError('Anthropic client not initialized', backend.name);
    }

    const response = await this.anthropic.messages.create({
      model: backend.model,
      max_tokens: request.maxTokens || 1024,
      temperature: request.temperature ?? 0,
      system: request.systemPrompt || 'You are a precise content classification assistant.',
      messages: [
        { role: 'user', content: request.input }
      ]
    });

    const output = response.content
      .flatMap(block => (block.type === 'text' ? [block.text] : []))
      .join('\n');

    return {
      output,
      model: backend.model,
      tokensUsed: response.usage.output_tokens,
      latencyMs: Date.now() - startTime
    };
  }

  private async inferOllama(
    request: InferenceRequest,
    backend: InferenceBackend,
    startTime: number
  ): Promise<InferenceResponse> {
    const baseUrl = backend.baseUrl || 'http://localhost:11434';

    const response = await fetch(`${baseUrl}/api/generate`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: backend.model,
        prompt: request.input,
        system: request.systemPrompt,
        stream: false,
        ...(request.json ? { format: 'json' } : {}),
        options: {
          temperature: request.temperature ?? 0,
          num_predict: request.maxTokens || 1024
        }
      })
    });

    if (!response.ok) {
      throw new InferenceError(`Ollama error: ${response.status}`, backend.name);
    }

    const data = ollamaResponseSchema.parse(await response.json());

    return {
      output: data.response,
      model: backend.model,
      tokensUsed: data.eval_count,
      latencyMs: Date.now() - startTime
    };
  }

  getAvailableBackends(): string[] {
    return Array.from(this.backends.keys());
  }
}
