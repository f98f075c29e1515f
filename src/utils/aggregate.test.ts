import { describe, it, expect } from 'vitest';
import { aggregate } from './aggregate';
import type { Project, UsageSample } from '../types/usage';

const NOW = new Date('2026-10-19T12:00:00Z');

const alpha: Project = { project_id: 'a1', project_name: 'alpha', domain_id: 'd1', domain_name: 'elixir' };
const beta: Project = { project_id: 'b1', project_name: 'beta', domain_id: 'd1', domain_name: 'elixir' };

function sample(project: Project, memory: number, vcpus: number): UsageSample {
  return { project, memory_mb_usage: memory, vcpu_usage: vcpus };
}

describe('aggregate', () => {
  it('multiplies each usage by its weight', () => {
    const snapshot = aggregate([sample(alpha, 1000.5, 3)], { mb_weight: 0.3, vcpu_weight: 1.7 }, 4, NOW);

    expect(snapshot.tick).toBe(4);
    expect(snapshot.created_at).toEqual(NOW);
    expect(snapshot.weights).toEqual({ mb_weight: 0.3, vcpu_weight: 1.7 });
    expect(snapshot.metrics).toEqual([
      { labels: alpha, name: 'total_memory_mb_usage', value: 1000.5 * 0.3 },
      { labels: alpha, name: 'total_vcpus_usage', value: 3 * 1.7 },
    ]);
  });

  it('emits one memory and one vcpu metric per project', () => {
    const snapshot = aggregate([sample(alpha, 10, 1), sample(beta, 20, 2)], { mb_weight: 1, vcpu_weight: 1 }, 0, NOW);

    expect(snapshot.metrics.map((metric) => [metric.labels.project_name, metric.name, metric.value])).toEqual([
      ['alpha', 'total_memory_mb_usage', 10],
      ['alpha', 'total_vcpus_usage', 1],
      ['beta', 'total_memory_mb_usage', 20],
      ['beta', 'total_vcpus_usage', 2],
    ]);
  });

  it('sums samples that share a label set', () => {
    const snapshot = aggregate([sample(alpha, 10, 1), sample({ ...alpha }, 5, 2)], { mb_weight: 2, vcpu_weight: 3 }, 0, NOW);

    expect(snapshot.metrics).toEqual([
      { labels: alpha, name: 'total_memory_mb_usage', value: 30 },
      { labels: alpha, name: 'total_vcpus_usage', value: 9 },
    ]);
  });

  it('keeps projects apart when only the name differs', () => {
    const hosted = { ...alpha, project_name: 'workshop' };
    const snapshot = aggregate([sample(alpha, 1, 1), sample(hosted, 2, 2)], { mb_weight: 1, vcpu_weight: 1 }, 0, NOW);
    expect(snapshot.metrics).toHaveLength(4);
  });

  it('returns an empty, frozen snapshot for no samples', () => {
    const snapshot = aggregate([], { mb_weight: 1, vcpu_weight: 1 }, 0, NOW);
    expect(snapshot.metrics).toEqual([]);
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.metrics)).toBe(true);
  });

  it('does not share state with its inputs', () => {
    const project = { ...alpha };
    const weights = { mb_weight: 1, vcpu_weight: 1 };
    const snapshot = aggregate([sample(project, 1, 1)], weights, 0, NOW);

    project.project_name = 'renamed';
    weights.mb_weight = 5;

    expect(snapshot.metrics[0].labels.project_name).toBe('alpha');
    expect(snapshot.weights.mb_weight).toBe(1);
    expect(Object.isFrozen(snapshot.metrics[0])).toBe(true);
  });
});
