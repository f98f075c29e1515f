import type { ExporterConfig } from './config/cli';
import { credentialsFromEnv, OpenStackClient } from './config/openstack';
import type { Logger } from './config/logger';
import { DomainFilter } from './utils/domain-filter';
import { PrometheusSink } from './utils/metrics-sink';
import { Scheduler, type SleepFn } from './utils/scheduler';
import { OpenStackUsageSource } from './utils/sources/openstack';
import { SimulatedUsageSource } from './utils/sources/simulated';
import { RemoteStartDateSource, StaticStartDateSource } from './utils/start-date';
import { DefaultWeightSource, RemoteWeightSource, StaticWeightSource } from './utils/weights';
import type { StartDateSource, UsageSource, WeightSource } from './types/sources';

export interface Exporter {
  filter: DomainFilter;
  usageSource: UsageSource;
  weightSource: WeightSource;
  startDateSource: StartDateSource;
  sink: PrometheusSink;
  scheduler: Scheduler;
}

export interface ExporterDependencies {
  logger: Logger;
  env: NodeJS.ProcessEnv;
  /** Instant the exporter started; start of simulated machines without `started_at` */
  startedAt: Date;
  clock?: () => Date;
  sleep?: SleepFn;
  fetchFn?: typeof fetch;
  defaultMetrics?: boolean;
}

/**
 * Pick the source variants the configuration asks for and wire them into a
 * scheduler. Variants are chosen here once; nothing downstream inspects them.
 *
 * @throws ConfigurationError when a dummy file cannot be used or OpenStack
 * credentials are missing
 */
export async function createExporter(config: ExporterConfig, deps: ExporterDependencies): Promise<Exporter> {
  const { logger } = deps;
  const timeoutMs = config.requestTimeoutSeconds * 1000;
  const simpleVm = { projectId: config.simpleVmId, tag: config.simpleVmTag };

  const filter = new DomainFilter({ domainId: config.domainId, domainNames: config.domains });

  let usageSource: UsageSource;
  if (config.dummyDataPath) {
    logger.info({ path: config.dummyDataPath, model: config.simulationModel }, 'Using simulated usage');
    usageSource = await SimulatedUsageSource.open({
      path: config.dummyDataPath,
      model: config.simulationModel,
      simpleVm,
      referenceInstant: deps.startedAt,
      logger: logger.child({ component: 'simulation' }),
    });
  } else {
    logger.info('Using regular OpenStack exporter');
    const client = new OpenStackClient(credentialsFromEnv(deps.env), timeoutMs, deps.fetchFn);
    usageSource = new OpenStackUsageSource(client, simpleVm, logger.child({ component: 'openstack' }));
  }

  let weightSource: WeightSource;
  if (config.dummyWeightsPath) {
    logger.info({ path: config.dummyWeightsPath }, 'Using dummy weights');
    weightSource = await StaticWeightSource.fromFile(config.dummyWeightsPath);
  } else if (config.weightUpdateEndpoint) {
    logger.info({ url: config.weightUpdateEndpoint }, 'Using weight update endpoint');
    weightSource = new RemoteWeightSource({
      url: config.weightUpdateEndpoint,
      timeoutMs,
      logger: logger.child({ component: 'weights' }),
      fetchFn: deps.fetchFn,
    });
  } else {
    weightSource = new DefaultWeightSource();
  }

  const startDateSource: StartDateSource = config.startDateEndpoint
    ? new RemoteStartDateSource({
        url: config.startDateEndpoint,
        timeoutMs,
        fallback: config.startDate,
        logger: logger.child({ component: 'start-date' }),
        fetchFn: deps.fetchFn,
        clock: deps.clock,
      })
    : new StaticStartDateSource(config.startDate);

  logger.info(`Exporting ${filter.describe()}`);

  const sink = new PrometheusSink({ defaultMetrics: deps.defaultMetrics });
  const scheduler = new Scheduler({
    usageSource,
    weightSource,
    startDateSource,
    filter,
    sink,
    updateIntervalMs: config.updateIntervalSeconds * 1000,
    weightUpdateFrequency: config.weightUpdateFrequency,
    logger: logger.child({ component: 'scheduler' }),
    clock: deps.clock,
    sleep: deps.sleep,
  });

  return { filter, usageSource, weightSource, startDateSource, sink, scheduler };
}
