export type { MonitoringBackend } from './backend.js';
export { InMemoryMonitoringBackend, type InMemoryMonitoringBackendOptions } from './memory-backend.js';
export { LangfuseBackend, encodeScoreValue, type LangfuseBackendConfig } from './langfuse-backend.js';
export { TraceRecorder, type TraceRecorderConfig } from './recorder.js';
export { createMonitoringBackend } from './factory.js';
