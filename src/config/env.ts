/**
 * Environment variables understood by the exporter. Each one backs a command
 * line flag; the flag wins when both are given.
 */
export const ENV = {
  dummyData: 'USAGE_EXPORTER_DUMMY_FILE',
  dummyWeights: 'USAGE_EXPORTER_DUMMY_WEIGHTS_FILE',
  domains: 'USAGE_EXPORTER_PROJECT_DOMAINS',
  domainId: 'USAGE_EXPORTER_PROJECT_DOMAIN_ID',
  simpleVmId: 'USAGE_EXPORTER_SIMPLE_VM_PROJECT_ID',
  simpleVmTag: 'USAGE_EXPORTER_SIMPLE_VM_PROJECT_TAG',
  weightUpdateFrequency: 'USAGE_EXPORTER_WEIGHT_UPDATE_FREQUENCY',
  weightUpdateEndpoint: 'USAGE_EXPORTER_WEIGHTS_UPDATE_ENDPOINT',
  startDateEndpoint: 'USAGE_EXPORTER_START_DATE_ENDPOINT',
  startDate: 'USAGE_EXPORTER_START_DATE',
  updateInterval: 'USAGE_EXPORTER_UPDATE_INTERVAL',
  port: 'USAGE_EXPORTER_PORT',
  requestTimeout: 'USAGE_EXPORTER_REQUEST_TIMEOUT',
  simulationModel: 'USAGE_EXPORTER_SIMULATION_MODEL',
  logLevel: 'LOG_LEVEL',
} as const;

export const DEFAULTS = {
  simpleVmTag: 'project_name',
  weightUpdateFrequency: 10,
  updateIntervalSeconds: 300,
  port: 8080,
  requestTimeoutSeconds: 30,
  simulationModel: 'allocation',
  logLevel: 'info',
} as const;
