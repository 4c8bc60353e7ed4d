import { resolve } from 'path';
import { loadConfig } from './config/index.js';
import { createLogger } from './logger.js';
import { InferenceRouter } from './inference/index.js';
import { GuardrailEvaluator, createScanners } from './scanners/index.js';
import { TraceRecorder, createMonitoringBackend } from './tracing/index.js';
import { LlmClassifier, TaxonomyLoader } from './classifier/index.js';
import { ClassificationGate } from './gate/index.js';
import { ConversionCallback } from './conversion/index.js';
import { buildApp } from './server/index.js';

async function main(): Promise<void> {
  const logger = createLogger();
  const config = loadConfig();

  logger.info('taxonomy-gate starting...');

  // Initialize components
  const inferenceRouter = new InferenceRouter(config.inference.backends, config.inference.default);
  const evaluator = new GuardrailEvaluator(createScanners(config.guardrails.scanners, inferenceRouter));
  const backend = createMonitoringBackend(config.monitoring);
  const recorder = new TraceRecorder(
    config.monitoring.backend === 'langfuse'
      ? {
        timeoutMs: config.monitoring.timeout_ms,
        lookupRetries: config.monitoring.lookup_retries,
        lookupRetryDelayMs: config.monitoring.lookup_retry_delay_ms
      }
      : { timeoutMs: config.monitoring.timeout_ms },
    backend,
    logger
  );

  const gate = new ClassificationGate(
    {
      evaluator,
      recorder,
      classifier: new LlmClassifier(inferenceRouter, {
        backend: config.classifier.backend,
        maxTokens: config.classifier.max_tokens
      }),
      taxonomy: new TaxonomyLoader(resolve(process.cwd(), config.taxonomy.path)),
      logger
    },
    {
      trackConversion: config.conversion.enabled,
      onScannerUnavailable: config.guardrails.on_unavailable
    }
  );

  const app = await buildApp({
    gate,
    conversion: new ConversionCallback(recorder, logger),
    evaluator,
    inferenceBackends: inferenceRouter.getAvailableBackends(),
    monitoringBackend: backend.name,
    logger,
    cors: { allowedOrigins: config.cors.allowed_origins },
    rateLimit: { requestsPerMinute: config.rate_limits.requests_per_minute }
  });

  if (config.monitoring.backend === 'memory') {
    logger.warn(
      { max_traces: config.monitoring.max_traces },
      'Using the in-memory monitoring backend; traces are lost on restart'
    );
  }

  await app.listen({ port: config.server.port, host: config.server.host });
  logger.info(`taxonomy-gate listening on ${config.server.host}:${config.server.port}`);
}

main().catch((err: unknown) => {
  console.error('taxonomy-gate failed to start:', err);
  process.exit(1);
});
