import { Command, CommanderError } from 'commander';
import type { LevelWithSilent } from 'pino';
import { parseDate } from '../api/validation';
import { ConfigurationError } from '../utils/errors';
import { isSimulationModel, type SimulationModel } from '../utils/simulation';
import { LOG_LEVELS } from './logger';
import { DEFAULTS, ENV } from './env';

/**
 * Resolved exporter configuration
 *
 * Built once at startup and passed to every component; nothing reads flags or
 * environment variables after this point.
 */
export interface ExporterConfig {
  dummyDataPath?: string;
  dummyWeightsPath?: string;
  domains: readonly string[];
  domainId?: string;
  simpleVmId?: string;
  simpleVmTag: string;
  weightUpdateFrequency: number;
  weightUpdateEndpoint?: string;
  startDateEndpoint?: string;
  startDate: Date;
  updateIntervalSeconds: number;
  port: number;
  requestTimeoutSeconds: number;
  simulationModel: SimulationModel;
  logLevel: LevelWithSilent;
}

type CliOptions = {
  dummyData?: string;
  dummyWeights?: string;
  domain?: string[] | true;
  domainId?: string;
  simpleVmId?: string;
  simpleVmTag?: string;
  weightUpdateFrequency?: string;
  weightUpdateEndpoint?: string;
  startDateEndpoint?: string;
  start?: string;
  updateInterval?: string;
  port?: string;
  requestTimeout?: string;
  simulationModel?: string;
  logLevel?: string;
};

export function buildProgram(): Command {
  return new Command()
    .name('project-usage-exporter')
    .description(
      'Query project usage from an OpenStack instance and provide it in a Prometheus compatible format'
    )
    .option(
      '-d, --dummy-data <path>',
      `use simulated usage from a machine description file instead of OpenStack, re-read on every update [${ENV.dummyData}]`
    )
    .option(
      '-w, --dummy-weights <path>',
      `use fixed weights from a file, excludes --weight-update-endpoint [${ENV.dummyWeights}]`
    )
    .option(
      '--domain [names...]',
      `only export projects of these domains, all readable projects when empty [${ENV.domains}, comma separated]`
    )
    .option('--domain-id <id>', `only export projects of this domain id, overrides --domain [${ENV.domainId}]`)
    .option('--simple-vm-id <id>', `project hosting SimpleVM sub-projects [${ENV.simpleVmId}]`)
    .option(
      '--simple-vm-tag <tag>',
      `metadata key naming the SimpleVM sub-project (default: ${DEFAULTS.simpleVmTag}) [${ENV.simpleVmTag}]`
    )
    .option(
      '--weight-update-frequency <ticks>',
      `refresh weights and start date every N updates (default: ${DEFAULTS.weightUpdateFrequency}) [${ENV.weightUpdateFrequency}]`
    )
    .option('--weight-update-endpoint <url>', `endpoint serving the weights [${ENV.weightUpdateEndpoint}]`)
    .option('--start-date-endpoint <url>', `endpoint serving the start date, overrides --start [${ENV.startDateEndpoint}]`)
    .option('-s, --start <date>', `beginning of the usage window (default: now) [${ENV.startDate}]`)
    .option(
      '-i, --update-interval <seconds>',
      `seconds to sleep between updates (default: ${DEFAULTS.updateIntervalSeconds}) [${ENV.updateInterval}]`
    )
    .option('-p, --port <port>', `port of the metrics server (default: ${DEFAULTS.port}) [${ENV.port}]`)
    .option(
      '--request-timeout <seconds>',
      `timeout of every remote request (default: ${DEFAULTS.requestTimeoutSeconds}) [${ENV.requestTimeout}]`
    )
    .option(
      '--simulation-model <model>',
      `allocation or integrated (default: ${DEFAULTS.simulationModel}) [${ENV.simulationModel}]`
    )
    .option('--log-level <level>', `log level (default: ${DEFAULTS.logLevel}) [${ENV.logLevel}]`)
    .exitOverride();
}

/**
 * Resolve flags, then environment variables, then defaults into one
 * validated configuration
 *
 * @param argv - user arguments, without the node binary and script path
 * @throws ConfigurationError for invalid or conflicting settings
 */
export function resolveConfig(argv: readonly string[], env: NodeJS.ProcessEnv, now: Date = new Date()): ExporterConfig {
  const program = buildProgram();
  try {
    program.parse([...argv], { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError && !isHelpOrVersion(err)) {
      throw new ConfigurationError(err.message, { cause: err });
    }
    throw err;
  }
  const opts = program.opts<CliOptions>();

  const pick = (flag: string | undefined, envName: string): string | undefined => {
    const value = flag ?? env[envName];
    return value === undefined || value.trim() === '' ? undefined : value.trim();
  };

  const dummyWeightsPath = pick(opts.dummyWeights, ENV.dummyWeights);
  const weightUpdateEndpoint = pick(opts.weightUpdateEndpoint, ENV.weightUpdateEndpoint);
  if (dummyWeightsPath && weightUpdateEndpoint) {
    throw new ConfigurationError(
      'Dummy weights and a weight update endpoint are mutually exclusive, configure only one of them'
    );
  }

  const startDateEndpoint = pick(opts.startDateEndpoint, ENV.startDateEndpoint);
  const rawStart = pick(opts.start, ENV.startDate);
  const startDate = rawStart === undefined ? new Date(now.getTime()) : parseDate(rawStart);
  if (!startDate) {
    throw new ConfigurationError(`Unrecognized start date: '${rawStart}'`);
  }
  if (startDate.getTime() > now.getTime()) {
    throw new ConfigurationError(`Start date '${rawStart}' lies in the future`);
  }

  const simulationModel = pick(opts.simulationModel, ENV.simulationModel) ?? DEFAULTS.simulationModel;
  if (!isSimulationModel(simulationModel)) {
    throw new ConfigurationError(`Unknown simulation model '${simulationModel}', use allocation or integrated`);
  }

  const logLevel = pick(opts.logLevel, ENV.logLevel) ?? DEFAULTS.logLevel;
  const level = LOG_LEVELS.find((candidate) => candidate === logLevel);
  if (!level) {
    throw new ConfigurationError(`Unknown log level '${logLevel}'`);
  }

  return Object.freeze({
    dummyDataPath: pick(opts.dummyData, ENV.dummyData),
    dummyWeightsPath,
    domains: Object.freeze(resolveDomains(opts.domain, env[ENV.domains])),
    domainId: pick(opts.domainId, ENV.domainId),
    simpleVmId: pick(opts.simpleVmId, ENV.simpleVmId),
    simpleVmTag: pick(opts.simpleVmTag, ENV.simpleVmTag) ?? DEFAULTS.simpleVmTag,
    weightUpdateFrequency: integer(
      'weight update frequency',
      pick(opts.weightUpdateFrequency, ENV.weightUpdateFrequency),
      DEFAULTS.weightUpdateFrequency,
      1
    ),
    weightUpdateEndpoint: weightUpdateEndpoint && url('weight update endpoint', weightUpdateEndpoint),
    startDateEndpoint: startDateEndpoint && url('start date endpoint', startDateEndpoint),
    startDate,
    updateIntervalSeconds: positive(
      'update interval',
      pick(opts.updateInterval, ENV.updateInterval),
      DEFAULTS.updateIntervalSeconds
    ),
    port: integer('port', pick(opts.port, ENV.port), DEFAULTS.port, 1, 65535),
    requestTimeoutSeconds: positive(
      'request timeout',
      pick(opts.requestTimeout, ENV.requestTimeout),
      DEFAULTS.requestTimeoutSeconds
    ),
    simulationModel,
    logLevel: level,
  });
}

function isHelpOrVersion(err: CommanderError): boolean {
  return err.code === 'commander.helpDisplayed' || err.code === 'commander.version';
}

/**
 * `--domain` without names means no filtering; the variable is comma separated
 */
function resolveDomains(flag: string[] | true | undefined, fromEnv: string | undefined): string[] {
  if (flag === true) {
    return [];
  }
  const names = flag ?? (fromEnv ?? '').split(',');
  return names.map((name) => name.trim()).filter((name) => name.length > 0);
}

function integer(name: string, raw: string | undefined, fallback: number, min: number, max = Infinity): number {
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    const range = max === Infinity ? `>= ${min}` : `between ${min} and ${max}`;
    throw new ConfigurationError(`Invalid ${name} '${raw}', expected an integer ${range}`);
  }
  return value;
}

function positive(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`Invalid ${name} '${raw}', expected a positive number of seconds`);
  }
  return value;
}

function url(name: string, raw: string): string {
  try {
    const parsed = new URL(raw);
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new Error(`unsupported protocol ${parsed.protocol}`);
    }
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Invalid ${name} '${raw}': ${reason}`, { cause: err });
  }
  return raw;
}
