import { StartDateResponseSchema } from '../api/schemas';
import { parseDate } from '../api/validation';
import { SourceUnavailableError } from './errors';
import { fetchJson, type FetchFn } from './http';
import type { StartDateSource } from '../types/sources';
import type { Logger } from '../config/logger';

/**
 * Start date given on the command line (or the exporter's start instant)
 */
export class StaticStartDateSource implements StartDateSource {
  readonly name = 'static';

  constructor(private readonly date: Date) {}

  async current(): Promise<Date> {
    return new Date(this.date.getTime());
  }
}

export interface RemoteStartDateSourceOptions {
  url: string;
  timeoutMs: number;
  /** Served until the endpoint answers for the first time */
  fallback: Date;
  logger: Logger;
  fetchFn?: FetchFn;
  clock?: () => Date;
}

/**
 * Start date served by an HTTP endpoint, either as a JSON string or as
 * `{ "start_date": "…" }`. Overrides the static start date. A date that
 * cannot be read or lies in the future keeps the previous one.
 */
export class RemoteStartDateSource implements StartDateSource {
  readonly name = 'start-date-endpoint';
  private cached: Date;

  constructor(private readonly options: RemoteStartDateSourceOptions) {
    this.cached = new Date(options.fallback.getTime());
  }

  async current(): Promise<Date> {
    try {
      this.cached = await this.fetch();
    } catch (err) {
      this.options.logger.warn({ err }, 'Start date update failed, keeping previous start date');
    }
    return new Date(this.cached.getTime());
  }

  private async fetch(): Promise<Date> {
    const body = await fetchJson(this.name, this.options.url, StartDateResponseSchema, this.options);
    const raw = typeof body === 'string' ? body : body.start_date;
    const date = parseDate(raw);
    if (!date) {
      throw new SourceUnavailableError(this.name, `Unrecognized date "${raw}"`);
    }
    const now = this.options.clock?.() ?? new Date();
    if (date.getTime() > now.getTime()) {
      throw new SourceUnavailableError(this.name, `Start date ${date.toISOString()} lies in the future`);
    }
    return date;
  }
}
