import type { DomainFilter } from '../utils/domain-filter';
import type { Snapshot, UsageSample, WeightTable } from './usage';

/**
 * Produces raw per-project usage for the window [windowStart, now)
 *
 * Rejects with SourceUnavailableError when the backing API or file cannot
 * be read. The filter is applied before any per-project work.
 */
export interface UsageSource {
  readonly name: string;
  collect(filter: DomainFilter, windowStart: Date, now: Date): Promise<UsageSample[]>;
}

/**
 * Current weight table. Never rejects: a failed refresh falls back to the
 * last value that could be read.
 */
export interface WeightSource {
  readonly name: string;
  current(): Promise<WeightTable>;
}

/** Start of the usage window; same failure contract as WeightSource */
export interface StartDateSource {
  readonly name: string;
  current(): Promise<Date>;
}

/** Receives every completed snapshot */
export interface MetricsSink {
  publish(snapshot: Snapshot): void;
  recordTick(outcome: TickOutcome): void;
}

export type TickOutcome = 'success' | 'failure';
