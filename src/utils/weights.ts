import { readFile } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { WeightTableSchema } from '../api/schemas';
import { validate } from '../api/validation';
import { ConfigurationError } from './errors';
import { fetchJson, type FetchFn } from './http';
import { NEUTRAL_WEIGHTS, type WeightTable } from '../types/usage';
import type { WeightSource } from '../types/sources';
import type { Logger } from '../config/logger';

/**
 * Neutral weights, used when no weight source is configured
 */
export class DefaultWeightSource implements WeightSource {
  readonly name = 'default';

  async current(): Promise<WeightTable> {
    return NEUTRAL_WEIGHTS;
  }
}

/**
 * Fixed weights from a dummy weights file
 */
export class StaticWeightSource implements WeightSource {
  readonly name = 'static';
  private readonly table: Readonly<WeightTable>;

  constructor(table: WeightTable) {
    this.table = Object.freeze({ ...table });
  }

  /**
   * Read and validate a `{ mb_weight, vcpu_weight }` document (YAML or JSON)
   */
  static async fromFile(path: string): Promise<StaticWeightSource> {
    let document: unknown;
    try {
      document = parseYaml(await readFile(path, 'utf8'));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConfigurationError(`Cannot read dummy weights file ${path}: ${reason}`, { cause: err });
    }

    const result = validate(WeightTableSchema, document);
    if (!result.valid) {
      throw new ConfigurationError(`Invalid dummy weights file ${path} (${result.reason})`);
    }
    return new StaticWeightSource(result.value);
  }

  async current(): Promise<WeightTable> {
    return this.table;
  }
}

export interface RemoteWeightSourceOptions {
  url: string;
  timeoutMs: number;
  logger: Logger;
  fetchFn?: FetchFn;
}

/**
 * Weights served by an HTTP endpoint
 *
 * Every call fetches; the scheduler decides how often that happens. A failed
 * fetch keeps the last table that could be read.
 */
export class RemoteWeightSource implements WeightSource {
  readonly name = 'weight-endpoint';
  private cached: Readonly<WeightTable> = NEUTRAL_WEIGHTS;

  constructor(private readonly options: RemoteWeightSourceOptions) {}

  async current(): Promise<WeightTable> {
    try {
      const table = await fetchJson(this.name, this.options.url, WeightTableSchema, this.options);
      this.cached = Object.freeze({ mb_weight: table.mb_weight, vcpu_weight: table.vcpu_weight });
    } catch (err) {
      this.options.logger.warn({ err }, 'Weight update failed, keeping previous weights');
    }
    return this.cached;
  }
}
