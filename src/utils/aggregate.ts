import type { ExportedMetric, MetricLabels, Snapshot, UsageSample, WeightTable } from '../types/usage';

function labelKey(labels: MetricLabels): string {
  return JSON.stringify([labels.domain_id, labels.domain_name, labels.project_id, labels.project_name]);
}

/**
 * Weight usage samples into an immutable snapshot
 *
 *   total_memory_mb_usage = memory_mb_usage * mb_weight
 *   total_vcpus_usage     = vcpu_usage * vcpu_weight
 *
 * Samples that share a label set are summed so every (labels, name) pair
 * appears once.
 */
export function aggregate(
  samples: readonly UsageSample[],
  weights: WeightTable,
  tick: number,
  now: Date
): Snapshot {
  const byLabels = new Map<string, { labels: MetricLabels; memory: number; vcpus: number }>();

  for (const sample of samples) {
    const key = labelKey(sample.project);
    const memory = sample.memory_mb_usage * weights.mb_weight;
    const vcpus = sample.vcpu_usage * weights.vcpu_weight;

    const existing = byLabels.get(key);
    if (existing) {
      existing.memory += memory;
      existing.vcpus += vcpus;
    } else {
      byLabels.set(key, { labels: { ...sample.project }, memory, vcpus });
    }
  }

  const metrics: Readonly<ExportedMetric>[] = [];
  for (const { labels, memory, vcpus } of byLabels.values()) {
    const frozenLabels = Object.freeze(labels);
    metrics.push(Object.freeze({ labels: frozenLabels, name: 'total_memory_mb_usage' as const, value: memory }));
    metrics.push(Object.freeze({ labels: frozenLabels, name: 'total_vcpus_usage' as const, value: vcpus }));
  }

  return Object.freeze({
    tick,
    created_at: new Date(now.getTime()),
    weights: Object.freeze({ mb_weight: weights.mb_weight, vcpu_weight: weights.vcpu_weight }),
    metrics: Object.freeze(metrics),
  });
}
