import { z } from 'zod';

const isValidPattern = (source: string): boolean => {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
};

const scannerPolicy = {
  name: z.string().min(1).optional(),
  threshold: z.number().min(0).max(1).default(0.5),
  // false: the score is recorded on the trace but never rejects
  block: z.boolean().default(true)
};

export const scannerConfigSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('prompt_injection'),
    ...scannerPolicy
  }),
  z.object({
    type: z.literal('prompt_injection_model'),
    backend: z.string().optional(),
    ...scannerPolicy
  }),
  z.object({
    type: z.literal('regex'),
    patterns: z.array(z.string().refine(isValidPattern, 'Invalid regular expression')).min(1),
    is_blocked: z.boolean().default(true),
    match_type: z.enum(['search', 'full']).default('search'),
    redact: z.boolean().default(false),
    ...scannerPolicy
  }),
  z.object({
    type: z.literal('token_limit'),
    limit: z.number().int().positive(),
    ...scannerPolicy
  })
]);

const inferenceBackendSchema = z.object({
  name: z.string().min(1),
  type: z.enum(['anthropic', 'ollama']),
  model: z.string().min(1),
  baseUrl: z.string().url().optional()
});

const timeoutMs = z.number().int().positive().default(5000);

export const monitoringConfigSchema = z.discriminatedUnion('backend', [
  z.object({
    backend: z.literal('memory'),
    // Oldest traces and their scores are dropped beyond this
    max_traces: z.number().int().positive().default(10000),
    timeout_ms: timeoutMs
  }),
  z.object({
    backend: z.literal('langfuse'),
    base_url: z.string().url().default('https://cloud.langfuse.com'),
    public_key: z.string().min(1),
    secret_key: z.string().min(1),
    // Ingestion is asynchronous, so a fresh score may not be readable yet
    lookup_retries: z.number().int().min(0).default(3),
    lookup_retry_delay_ms: z.number().int().min(0).default(500),
    timeout_ms: timeoutMs
  })
]);

export const configSchema = z.object({
  server: z.object({
    port: z.number().int().min(1).max(65535).default(8080),
    host: z.string().default('127.0.0.1')
  }).default({}),

  cors: z.object({
    allowed_origins: z.array(z.string()).default(['http://localhost:*'])
  }).default({}),

  rate_limits: z.object({
    requests_per_minute: z.number().int().positive().default(600)
  }).default({}),

  inference: z.object({
    backends: z.array(inferenceBackendSchema).min(1).default([
      { name: 'claude', type: 'anthropic', model: 'claude-3-5-haiku-20241022' }
    ]),
    default: z.string().default('claude')
  }).default({}).refine(
    inference => inference.backends.some(backend => backend.name === inference.default),
    { message: 'inference.default must name a configured backend' }
  ),

  classifier: z.object({
    backend: z.string().optional(),
    max_tokens: z.number().int().positive().default(512)
  }).default({}),

  taxonomy: z.object({
    path: z.string().min(1).default('taxonomy/content-taxonomy.yaml')
  }).default({}),

  guardrails: z.object({
    on_unavailable: z.enum(['fail_closed', 'fail_open']).default('fail_closed'),
    scanners: z.array(scannerConfigSchema).default([{ type: 'prompt_injection' }])
  }).default({}),

  monitoring: monitoringConfigSchema,

  conversion: z.object({
    enabled: z.boolean().default(true)
  }).default({})
});

export type Config = z.infer<typeof configSchema>;
export type ScannerConfig = z.infer<typeof scannerConfigSchema>;
export type MonitoringConfig = z.infer<typeof monitoringConfigSchema>;
