/**
 * Usage Data Model
 *
 * Raw usage flows from a UsageSource as UsageSamples, gets weighted by the
 * Aggregator and leaves the process as a Snapshot of ExportedMetrics.
 * Everything here is recreated on every tick and never mutated in place.
 */

/** Identity of a project (tenant) as exported in metric labels */
export interface Project {
  project_id: string;
  project_name: string;
  domain_id: string;
  domain_name: string;
}

/**
 * Raw, unweighted reading for one project
 *
 * Units depend on the source: the OpenStack usage API reports MB-hours and
 * vCPU-hours, the allocation simulation reports currently allocated MB and vCPUs.
 */
export interface UsageSample {
  project: Project;
  memory_mb_usage: number;
  vcpu_usage: number;
}

/** Per-resource multipliers applied before export */
export interface WeightTable {
  mb_weight: number;
  vcpu_weight: number;
}

export const NEUTRAL_WEIGHTS: Readonly<WeightTable> = Object.freeze({
  mb_weight: 1.0,
  vcpu_weight: 1.0,
});

/** One simulated machine */
export interface LifetimeSpec {
  project: Project;
  memory_mb: number;
  vcpus: number;
  started_at: Date;
  /** null while the machine is still running */
  ended_at: Date | null;
  metadata: Record<string, string>;
}

export type MetricName = 'total_memory_mb_usage' | 'total_vcpus_usage';

export const METRIC_NAMES: readonly MetricName[] = ['total_memory_mb_usage', 'total_vcpus_usage'];

export type MetricLabels = Project;

export interface ExportedMetric {
  labels: MetricLabels;
  name: MetricName;
  value: number;
}

/**
 * Complete result of one scheduler tick
 *
 * Frozen by the Aggregator; the MetricsSink only ever swaps the reference.
 */
export interface Snapshot {
  tick: number;
  created_at: Date;
  weights: Readonly<WeightTable>;
  metrics: readonly Readonly<ExportedMetric>[];
}
