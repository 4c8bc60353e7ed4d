import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { ConfigError, errorMessage } from '../errors.js';
import { configSchema, type Config } from './schema.js';

export { configSchema, scannerConfigSchema, monitoringConfigSchema } from './schema.js';
export type { Config, ScannerConfig, MonitoringConfig } from './schema.js';

export const DEFAULT_CONFIG_PATHS = [
  resolve(process.cwd(), 'taxonomy-gate.yaml'),
  resolve(homedir(), '.taxonomy-gate', 'config.yaml'),
  resolve(homedir(), '.config', 'taxonomy-gate', 'config.yaml')
];

export interface LoadConfigOptions {
  paths?: string[];
  env?: NodeJS.ProcessEnv;
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  const paths = options.paths ?? DEFAULT_CONFIG_PATHS;
  const env = options.env ?? process.env;

  let raw: Record<string, unknown> = {};
  for (const path of paths) {
    if (existsSync(path)) {
      raw = readConfigFile(path);
      break;
    }
  }

  const result = configSchema.safeParse(applyEnvOverrides(raw, env));
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  return result.data;
}

function readConfigFile(path: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot read configuration ${path}: ${errorMessage(error)}`);
  }

  // An empty file parses to null
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigError(`Configuration ${path} must be a YAML mapping`);
  }
  return parsed;
}

// Credentials and deployment knobs come from the environment when set
function applyEnvOverrides(raw: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const server = asRecord(raw.server);
  const taxonomy = asRecord(raw.taxonomy);
  const monitoring = asRecord(raw.monitoring);

  if (env.PORT) server.port = parseInt(env.PORT, 10);
  if (env.HOST) server.host = env.HOST;
  if (env.TAXONOMY_PATH) taxonomy.path = env.TAXONOMY_PATH;

  if (env.LANGFUSE_PUBLIC_KEY) monitoring.public_key = env.LANGFUSE_PUBLIC_KEY;
  if (env.LANGFUSE_SECRET_KEY) monitoring.secret_key = env.LANGFUSE_SECRET_KEY;
  if (env.LANGFUSE_HOST) monitoring.base_url = env.LANGFUSE_HOST;

  if (monitoring.backend === undefined) {
    monitoring.backend = monitoring.public_key !== undefined ? 'langfuse' : 'memory';
  }

  return { ...raw, server, taxonomy, monitoring };
}

function asRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? { ...value } : {};
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
