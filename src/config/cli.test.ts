import { describe, it, expect } from 'vitest';
import { resolveConfig } from './cli';
import { ConfigurationError } from '../utils/errors';

const NOW = new Date('2026-10-19T12:00:00Z');

describe('resolveConfig', () => {
  it('falls back to defaults', () => {
    expect(resolveConfig([], {}, NOW)).toEqual({
      dummyDataPath: undefined,
      dummyWeightsPath: undefined,
      domains: [],
      domainId: undefined,
      simpleVmId: undefined,
      simpleVmTag: 'project_name',
      weightUpdateFrequency: 10,
      weightUpdateEndpoint: undefined,
      startDateEndpoint: undefined,
      startDate: NOW,
      updateIntervalSeconds: 300,
      port: 8080,
      requestTimeoutSeconds: 30,
      simulationModel: 'allocation',
      logLevel: 'info',
    });
  });

  it('reads environment variables', () => {
    const config = resolveConfig([], {
      USAGE_EXPORTER_DUMMY_FILE: 'resources/dummy_machines.yaml',
      USAGE_EXPORTER_PROJECT_DOMAINS: 'elixir, de.NBI ,',
      USAGE_EXPORTER_UPDATE_INTERVAL: '60',
      USAGE_EXPORTER_START_DATE: '2026-10-01T00:00:00Z',
      USAGE_EXPORTER_SIMPLE_VM_PROJECT_ID: 'umbrella',
      LOG_LEVEL: 'debug',
    }, NOW);

    expect(config.dummyDataPath).toBe('resources/dummy_machines.yaml');
    expect(config.domains).toEqual(['elixir', 'de.NBI']);
    expect(config.updateIntervalSeconds).toBe(60);
    expect(config.startDate.toISOString()).toBe('2026-10-01T00:00:00.000Z');
    expect(config.simpleVmId).toBe('umbrella');
    expect(config.logLevel).toBe('debug');
  });

  it('prefers flags over environment variables', () => {
    const config = resolveConfig(
      ['--update-interval', '15', '--domain', 'alpha', 'beta', '-p', '9100'],
      { USAGE_EXPORTER_UPDATE_INTERVAL: '60', USAGE_EXPORTER_PROJECT_DOMAINS: 'elixir', USAGE_EXPORTER_PORT: '9000' },
      NOW
    );

    expect(config.updateIntervalSeconds).toBe(15);
    expect(config.domains).toEqual(['alpha', 'beta']);
    expect(config.port).toBe(9100);
  });

  it('treats a bare --domain as no filtering', () => {
    const config = resolveConfig(['--domain'], { USAGE_EXPORTER_PROJECT_DOMAINS: 'elixir' }, NOW);

    expect(config.domains).toEqual([]);
  });

  it('rejects dummy weights together with a weight endpoint', () => {
    expect(() =>
      resolveConfig(['-w', 'weights.yaml', '--weight-update-endpoint', 'http://localhost:8090/weights'], {}, NOW)
    ).toThrow(ConfigurationError);
    expect(() =>
      resolveConfig(['-w', 'weights.yaml'], { USAGE_EXPORTER_WEIGHTS_UPDATE_ENDPOINT: 'http://localhost:8090/weights' }, NOW)
    ).toThrow(/mutually exclusive/);
  });

  it('rejects an unreadable start date', () => {
    expect(() => resolveConfig(['--start', 'yesterday-ish'], {}, NOW)).toThrow(
      "Unrecognized start date: 'yesterday-ish'"
    );
  });

  it('rejects a start date in the future', () => {
    expect(() => resolveConfig(['-s', '2026-10-20T00:00:00Z'], {}, NOW)).toThrow(
      "Start date '2026-10-20T00:00:00Z' lies in the future"
    );
    expect(resolveConfig(['-s', '2026-10-19T12:00:00Z'], {}, NOW).startDate).toEqual(NOW);
  });

  it('rejects values outside their range', () => {
    expect(() => resolveConfig(['--weight-update-frequency', '0'], {}, NOW)).toThrow(
      "Invalid weight update frequency '0', expected an integer >= 1"
    );
    expect(() => resolveConfig(['--port', '70000'], {}, NOW)).toThrow(
      "Invalid port '70000', expected an integer between 1 and 65535"
    );
    expect(() => resolveConfig(['-i', '-5'], {}, NOW)).toThrow(ConfigurationError);
    expect(() => resolveConfig(['--request-timeout', 'soon'], {}, NOW)).toThrow(ConfigurationError);
  });

  it('rejects endpoints that are not http urls', () => {
    expect(() => resolveConfig(['--start-date-endpoint', 'ftp://example.test/start'], {}, NOW)).toThrow(
      /Invalid start date endpoint/
    );
  });

  it('rejects an unknown simulation model and log level', () => {
    expect(() => resolveConfig(['--simulation-model', 'random'], {}, NOW)).toThrow(/Unknown simulation model 'random'/);
    expect(() => resolveConfig([], { LOG_LEVEL: 'loud' }, NOW)).toThrow("Unknown log level 'loud'");
  });

  it('turns unknown flags into configuration errors', () => {
    expect(() => resolveConfig(['--no-such-flag'], {}, NOW)).toThrow(ConfigurationError);
  });

  it('returns a frozen configuration', () => {
    const config = resolveConfig(['--domain', 'alpha'], {}, NOW);

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.domains)).toBe(true);
  });
});
