import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { buildServer, type MetricsServer } from './server';
import { PrometheusSink } from '../utils/metrics-sink';
import { aggregate } from '../utils/aggregate';
import { silentLogger } from '../config/logger';

const NOW = new Date('2026-10-19T12:00:00Z');

const project = { project_id: 'p1', project_name: 'genome', domain_id: 'd1', domain_name: 'elixir' };

describe('scrape server', () => {
  let sink: PrometheusSink;
  let app: MetricsServer;

  beforeEach(async () => {
    sink = new PrometheusSink();
    app = buildServer({ sink, logger: silentLogger });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it('reports health before the first snapshot', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'ok', tick: null });
  });

  it('answers 503 on /v1/snapshot until a snapshot is published', async () => {
    const response = await app.inject({ method: 'GET', url: '/v1/snapshot' });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toEqual({ error: 'No snapshot published yet' });
  });

  it('serves the last snapshot as JSON', async () => {
    sink.publish(aggregate([{ project, memory_mb_usage: 2048, vcpu_usage: 4 }], { mb_weight: 0.5, vcpu_weight: 2 }, 3, NOW));

    const response = await app.inject({ method: 'GET', url: '/v1/snapshot' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      tick: 3,
      created_at: '2026-10-19T12:00:00.000Z',
      weights: { mb_weight: 0.5, vcpu_weight: 2 },
      metrics: [
        { name: 'total_memory_mb_usage', value: 1024, labels: project },
        { name: 'total_vcpus_usage', value: 8, labels: project },
      ],
    });

    const health = await app.inject({ method: 'GET', url: '/health' });
    expect(health.json()).toEqual({ status: 'ok', tick: 3 });
  });

  it('serves the Prometheus exposition on /metrics', async () => {
    sink.publish(aggregate([{ project, memory_mb_usage: 2048, vcpu_usage: 4 }], { mb_weight: 1, vcpu_weight: 1 }, 0, NOW));

    const response = await app.inject({ method: 'GET', url: '/metrics' });
    const lines = response.body.split('\n');

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe(sink.contentType);
    expect(lines).toContain('# TYPE project_mb_usage gauge');
    expect(lines.filter((line) => line.startsWith('project_vcpu_usage{'))).toHaveLength(1);
  });
});
