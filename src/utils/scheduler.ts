import { setTimeout as delay } from 'timers/promises';
import { aggregate } from './aggregate';
import type { DomainFilter } from './domain-filter';
import type { MetricsSink, StartDateSource, UsageSource, WeightSource } from '../types/sources';
import { NEUTRAL_WEIGHTS, type Snapshot, type WeightTable } from '../types/usage';
import type { Logger } from '../config/logger';

export type SchedulerState = 'idle' | 'collecting' | 'exporting' | 'sleeping' | 'stopped';

export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

export interface SchedulerOptions {
  usageSource: UsageSource;
  weightSource: WeightSource;
  startDateSource: StartDateSource;
  filter: DomainFilter;
  sink: MetricsSink;
  /** Delay between the end of one cycle and the start of the next */
  updateIntervalMs: number;
  /** Weights and start date are refreshed on every Nth tick, starting with tick 0 */
  weightUpdateFrequency: number;
  logger: Logger;
  clock?: () => Date;
  sleep?: SleepFn;
}

const defaultSleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * The polling loop
 *
 * Usage is collected every tick; weights and the start date only on every
 * `weightUpdateFrequency`th tick, and before that tick collects. A failed tick
 * leaves the previous snapshot published and the loop carries on after the
 * usual delay.
 */
export class Scheduler {
  private readonly options: SchedulerOptions;
  private readonly clock: () => Date;
  private readonly sleep: SleepFn;
  private tickCount = 0;
  private weights: Readonly<WeightTable> = NEUTRAL_WEIGHTS;
  private startDate: Date;
  private currentState: SchedulerState = 'idle';

  constructor(options: SchedulerOptions) {
    if (!Number.isInteger(options.weightUpdateFrequency) || options.weightUpdateFrequency < 1) {
      throw new RangeError('weightUpdateFrequency must be a positive integer');
    }
    this.options = options;
    this.clock = options.clock ?? (() => new Date());
    this.sleep = options.sleep ?? defaultSleep;
    this.startDate = this.clock();
  }

  get state(): SchedulerState {
    return this.currentState;
  }

  /** Number of ticks started so far */
  get ticks(): number {
    return this.tickCount;
  }

  get currentWeights(): Readonly<WeightTable> {
    return this.weights;
  }

  get windowStart(): Date {
    return new Date(this.startDate.getTime());
  }

  /**
   * Run until the signal aborts. The signal is checked at the top of every
   * cycle and before each sleep, and cuts a running sleep short.
   */
  async run(signal: AbortSignal): Promise<void> {
    const { logger, updateIntervalMs } = this.options;
    logger.info(
      { updateIntervalMs, weightUpdateFrequency: this.options.weightUpdateFrequency },
      'Scheduler started'
    );

    while (!signal.aborted) {
      await this.tick(signal);
      if (signal.aborted) {
        break;
      }

      this.currentState = 'sleeping';
      try {
        await this.sleep(updateIntervalMs, signal);
      } catch (err) {
        if (!signal.aborted) {
          throw err;
        }
      }
    }

    this.currentState = 'stopped';
    logger.info({ ticks: this.tickCount }, 'Scheduler stopped');
  }

  /**
   * Run a single cycle: refresh if due, collect, aggregate, publish
   *
   * Resolves with the published snapshot, or undefined when the tick failed
   * or was interrupted by shutdown.
   */
  async tick(signal?: AbortSignal): Promise<Snapshot | undefined> {
    const { usageSource, filter, sink, logger, weightUpdateFrequency } = this.options;
    const tick = this.tickCount++;
    this.currentState = 'collecting';

    try {
      if (tick % weightUpdateFrequency === 0) {
        await this.refresh(tick);
      }

      const now = this.clock();
      const samples = await usageSource.collect(filter, this.startDate, now);
      if (signal?.aborted) {
        logger.info({ tick }, 'Shutdown requested, dropping unfinished update');
        return undefined;
      }

      this.currentState = 'exporting';
      const snapshot = aggregate(samples, this.weights, tick, now);
      sink.publish(snapshot);
      sink.recordTick('success');
      logger.debug({ tick, projects: samples.length, metrics: snapshot.metrics.length }, 'Published snapshot');
      return snapshot;
    } catch (err) {
      sink.recordTick('failure');
      logger.error({ err, tick }, 'Update failed, keeping previous snapshot');
      return undefined;
    }
  }

  private async refresh(tick: number): Promise<void> {
    const { weightSource, startDateSource, logger } = this.options;
    const weights = await weightSource.current();
    const startDate = await startDateSource.current();

    this.weights = Object.freeze({ mb_weight: weights.mb_weight, vcpu_weight: weights.vcpu_weight });
    this.startDate = startDate;
    logger.info(
      { tick, weights: this.weights, startDate: startDate.toISOString() },
      'Refreshed weights and start date'
    );
  }
}
