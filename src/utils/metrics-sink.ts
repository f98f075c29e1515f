import { Counter, Gauge, Registry, collectDefaultMetrics } from 'prom-client';
import type { MetricsSink, TickOutcome } from '../types/sources';
import { METRIC_NAMES, type MetricName, type Snapshot } from '../types/usage';

const PROJECT_LABELS = ['project_id', 'project_name', 'domain_name', 'domain_id'] as const;

type ProjectLabel = (typeof PROJECT_LABELS)[number];

/** Prometheus gauge exported for each snapshot metric */
export const GAUGE_NAMES: Record<MetricName, string> = {
  total_memory_mb_usage: 'project_mb_usage',
  total_vcpus_usage: 'project_vcpu_usage',
};

export interface PrometheusSinkOptions {
  /** Also export Node.js process metrics */
  defaultMetrics?: boolean;
}

/**
 * Holds the last published snapshot and exposes it through a dedicated
 * prom-client registry
 *
 * Project gauges are rebuilt from the current snapshot on every scrape, so a
 * scrape sees exactly one snapshot and publishing never waits for a reader.
 */
export class PrometheusSink implements MetricsSink {
  readonly registry = new Registry();
  private snapshot: Snapshot | undefined;
  private readonly ticks: Counter<'outcome'>;
  private readonly lastSuccess: Gauge;

  constructor(options: PrometheusSinkOptions = {}) {
    const read = (): Snapshot | undefined => this.snapshot;

    for (const name of METRIC_NAMES) {
      new Gauge<ProjectLabel>({
        name: GAUGE_NAMES[name],
        help: name === 'total_memory_mb_usage' ? 'Total MB usage' : 'Total vcpu usage',
        labelNames: PROJECT_LABELS,
        registers: [this.registry],
        collect() {
          this.reset();
          for (const metric of read()?.metrics ?? []) {
            if (metric.name === name) {
              this.set({ ...metric.labels }, metric.value);
            }
          }
        },
      });
    }

    new Gauge<'resource'>({
      name: 'usage_exporter_weight',
      help: 'Weight applied to the raw usage of a resource',
      labelNames: ['resource'],
      registers: [this.registry],
      collect() {
        this.reset();
        const weights = read()?.weights;
        if (weights) {
          this.set({ resource: 'memory_mb' }, weights.mb_weight);
          this.set({ resource: 'vcpus' }, weights.vcpu_weight);
        }
      },
    });

    this.ticks = new Counter({
      name: 'usage_exporter_ticks_total',
      help: 'Completed update cycles by outcome',
      labelNames: ['outcome'],
      registers: [this.registry],
    });

    this.lastSuccess = new Gauge({
      name: 'usage_exporter_last_success_timestamp_seconds',
      help: 'Unix time of the last published snapshot',
      registers: [this.registry],
    });

    if (options.defaultMetrics) {
      collectDefaultMetrics({ register: this.registry });
    }
  }

  publish(snapshot: Snapshot): void {
    this.snapshot = snapshot;
    this.lastSuccess.set(snapshot.created_at.getTime() / 1000);
  }

  recordTick(outcome: TickOutcome): void {
    this.ticks.inc({ outcome });
  }

  current(): Snapshot | undefined {
    return this.snapshot;
  }

  async metrics(): Promise<string> {
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }
}
