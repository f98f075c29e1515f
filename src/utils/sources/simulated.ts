import { readFile } from 'fs/promises';
import { parseSimulation, USAGE_MODELS, type ParsedSimulation, type SimulationModel } from '../simulation';
import { splitSimpleVmUsage, type SimpleVmOptions } from '../simplevm';
import { ConfigurationError, toSourceUnavailable } from '../errors';
import type { DomainFilter } from '../domain-filter';
import type { UsageSource } from '../../types/sources';
import type { UsageSample } from '../../types/usage';
import type { Logger } from '../../config/logger';

export interface SimulatedUsageSourceOptions {
  path: string;
  model: SimulationModel;
  simpleVm: SimpleVmOptions;
  /** Start of machines without `started_at`, normally the exporter start */
  referenceInstant: Date;
  logger: Logger;
}

/**
 * Usage computed from a local simulation file
 *
 * The file is read again on every collect() so it can be edited while the
 * exporter runs.
 */
export class SimulatedUsageSource implements UsageSource {
  readonly name = 'simulation';
  private readonly options: SimulatedUsageSourceOptions;

  constructor(options: SimulatedUsageSourceOptions) {
    this.options = options;
  }

  /**
   * Create the source after checking the file can be read and parsed
   */
  static async open(options: SimulatedUsageSourceOptions): Promise<SimulatedUsageSource> {
    const source = new SimulatedUsageSource(options);
    try {
      await source.load();
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConfigurationError(`Cannot use simulation file ${options.path}: ${reason}`, { cause: err });
    }
    return source;
  }

  async collect(filter: DomainFilter, windowStart: Date, now: Date): Promise<UsageSample[]> {
    let simulation: ParsedSimulation;
    try {
      simulation = await this.load();
    } catch (err) {
      throw toSourceUnavailable(this.name, err);
    }

    for (const issue of simulation.issues) {
      this.options.logger.warn({ entry: issue.entry }, `Skipping simulation entry: ${issue.message}`);
    }

    const usageOf = USAGE_MODELS[this.options.model];
    const samples: UsageSample[] = [];

    for (const { project, machines } of simulation.projects) {
      if (!filter.accepts(project)) {
        continue;
      }
      const instances = machines.map((machine) => ({
        ...usageOf(machine, now, windowStart),
        metadata: machine.metadata,
      }));
      samples.push(...splitSimpleVmUsage(project, instances, this.options.simpleVm));
    }

    return samples;
  }

  private async load(): Promise<ParsedSimulation> {
    const text = await readFile(this.options.path, 'utf8');
    return parseSimulation(text, this.options.referenceInstant);
  }
}
