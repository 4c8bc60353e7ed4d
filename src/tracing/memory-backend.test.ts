import { describe, it, expect } from 'vitest';
import { InMemoryMonitoringBackend } from './memory-backend.js';
import type { TraceRecord } from '../types/index.js';

function trace(id: string): TraceRecord {
  return { id, name: 'classify', timestamp: '2026-01-01T00:00:00.000Z', status: 'open' };
}

describe('InMemoryMonitoringBackend', () => {
  it('merges a later update into the stored trace', async () => {
    const backend = new InMemoryMonitoringBackend();
    await backend.upsertTrace({ ...trace('t1'), input: { description: 'hello' } });
    await backend.upsertTrace({ ...trace('t1'), status: 'completed', output: 'done' });

    expect(backend.getTrace('t1')).toEqual({
      ...trace('t1'),
      status: 'completed',
      input: { description: 'hello' },
      output: 'done',
      metadata: {}
    });
  });

  it('drops the oldest trace and its scores beyond maxTraces', async () => {
    const backend = new InMemoryMonitoringBackend({ maxTraces: 2 });
    await backend.upsertTrace(trace('t1'));
    await backend.upsertScore({ id: 's1', traceId: 't1', name: 'converted', value: false, timestamp: '2026-01-01T00:00:00.000Z' });
    await backend.upsertTrace(trace('t2'));
    await backend.upsertTrace(trace('t3'));

    expect(backend.traceIds()).toEqual(['t2', 't3']);
    expect(await backend.getScore('s1')).toBeNull();
  });

  it('does not count updates to a known trace as new', async () => {
    const backend = new InMemoryMonitoringBackend({ maxTraces: 2 });
    await backend.upsertTrace(trace('t1'));
    await backend.upsertTrace(trace('t2'));
    await backend.upsertTrace({ ...trace('t1'), status: 'completed' });

    expect(backend.traceCount).toBe(2);
    expect(backend.traceIds()).toEqual(['t1', 't2']);
  });
});
