import type { MonitoringConfig } from '../config/index.js';
import type { MonitoringBackend } from './backend.js';
import { InMemoryMonitoringBackend } from './memory-backend.js';
import { LangfuseBackend } from './langfuse-backend.js';

export function createMonitoringBackend(config: MonitoringConfig): MonitoringBackend {
  switch (config.backend) {
    case 'memory':
      return new InMemoryMonitoringBackend({ maxTraces: config.max_traces });

    case 'langfuse':
      return new LangfuseBackend({
        baseUrl: config.base_url,
        publicKey: config.public_key,
        secretKey: config.secret_key
      });
  }
}
