import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadConfig } from './index.js';
import { ConfigError } from '../errors.js';

let dir: string;

beforeAll(() => {
  dir = mkdtempSync(join(tmpdir(), 'config-test-'));
});

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

function writeConfig(name: string, content: string): string {
  const path = join(dir, name);
  writeFileSync(path, content);
  return path;
}

describe('loadConfig: defaults', () => {
  it('uses built-in defaults when no file exists', () => {
    const config = loadConfig({ paths: [join(dir, 'absent.yaml')], env: {} });

    expect(config.server).toEqual({ port: 8080, host: '127.0.0.1' });
    expect(config.monitoring).toEqual({ backend: 'memory', max_traces: 10000, timeout_ms: 5000 });
    expect(config.guardrails).toEqual({
      on_unavailable: 'fail_closed',
      scanners: [{ type: 'prompt_injection', threshold: 0.5, block: true }]
    });
    expect(config.conversion.enabled).toBe(true);
    expect(config.inference.default).toBe('claude');
  });

  it('switches to Langfuse when credentials are in the environment', () => {
    const config = loadConfig({
      paths: [],
      env: { LANGFUSE_PUBLIC_KEY: 'pk-test', LANGFUSE_SECRET_KEY: 'sk-test' }
    });

    expect(config.monitoring).toEqual({
      backend: 'langfuse',
      base_url: 'https://cloud.langfuse.com',
      public_key: 'pk-test',
      secret_key: 'sk-test',
      lookup_retries: 3,
      lookup_retry_delay_ms: 500,
      timeout_ms: 5000
    });
  });
});

describe('loadConfig: files', () => {
  it('reads the first existing file and fills defaults', () => {
    const path = writeConfig('full.yaml', [
      'server:',
      '  port: 9090',
      'guardrails:',
      '  on_unavailable: fail_open',
      '  scanners:',
      '    - type: regex',
      '      name: secrets',
      '      patterns: ["sk-[a-z]+"]',
      '      redact: true',
      '      block: false',
      'monitoring:',
      '  backend: memory',
      '  timeout_ms: 250'
    ].join('\n'));

    const config = loadConfig({ paths: [join(dir, 'absent.yaml'), path], env: {} });

    expect(config.server.port).toBe(9090);
    expect(config.monitoring).toEqual({ backend: 'memory', max_traces: 10000, timeout_ms: 250 });
    expect(config.guardrails.on_unavailable).toBe('fail_open');
    expect(config.guardrails.scanners).toEqual([{
      type: 'regex',
      name: 'secrets',
      patterns: ['sk-[a-z]+'],
      is_blocked: true,
      match_type: 'search',
      redact: true,
      threshold: 0.5,
      block: false
    }]);
  });

  it('lets the environment override the file', () => {
    const path = writeConfig('env.yaml', 'server:\n  port: 9090\ntaxonomy:\n  path: a.yaml\n');

    const config = loadConfig({ paths: [path], env: { PORT: '7070', TAXONOMY_PATH: 'b.yaml' } });

    expect(config.server.port).toBe(7070);
    expect(config.taxonomy.path).toBe('b.yaml');
  });

  it('treats an empty file as all defaults', () => {
    const path = writeConfig('empty.yaml', '');
    expect(loadConfig({ paths: [path], env: {} }).server.port).toBe(8080);
  });
});

describe('loadConfig: validation', () => {
  it('rejects a threshold outside [0, 1]', () => {
    const path = writeConfig('threshold.yaml', 'guardrails:\n  scanners:\n    - type: prompt_injection\n      threshold: 2\n');
    expect(() => loadConfig({ paths: [path], env: {} })).toThrow(ConfigError);
  });

  it('rejects an invalid regex pattern', () => {
    const path = writeConfig('regex.yaml', 'guardrails:\n  scanners:\n    - type: regex\n      patterns: ["("]\n');
    expect(() => loadConfig({ paths: [path], env: {} })).toThrow(/Invalid regular expression/);
  });

  it('rejects a default backend that is not configured', () => {
    const path = writeConfig('backend.yaml', 'inference:\n  default: nowhere\n');
    expect(() => loadConfig({ paths: [path], env: {} })).toThrow(/inference.default must name a configured backend/);
  });

  it('rejects Langfuse without credentials', () => {
    const path = writeConfig('langfuse.yaml', 'monitoring:\n  backend: langfuse\n');
    expect(() => loadConfig({ paths: [path], env: {} })).toThrow(/monitoring.public_key/);
  });

  it('rejects a file that is not a mapping', () => {
    const path = writeConfig('list.yaml', '- a\n- b\n');
    expect(() => loadConfig({ paths: [path], env: {} })).toThrow('must be a YAML mapping');
  });
});
