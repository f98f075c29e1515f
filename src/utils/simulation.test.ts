import { describe, it, expect } from 'vitest';
import {
  allocationUsage,
  integratedUsage,
  isSimulationModel,
  parseSimulation,
  simulatedId,
} from './simulation';
import type { LifetimeSpec } from '../types/usage';

const NOW = new Date('2026-10-19T12:00:00Z');
const HOUR = 60 * 60 * 1000;

function machine(overrides: Partial<LifetimeSpec> = {}): LifetimeSpec {
  return {
    project: { project_id: 'p1', project_name: 'demo', domain_id: 'd1', domain_name: 'alpha' },
    memory_mb: 2048,
    vcpus: 4,
    started_at: new Date(NOW.getTime() - HOUR),
    ended_at: null,
    metadata: {},
    ...overrides,
  };
}

describe('allocationUsage', () => {
  it('reports the full size of a running machine', () => {
    expect(allocationUsage(machine(), NOW, NOW)).toEqual({ memory_mb_usage: 2048, vcpu_usage: 4 });
  });

  it('reports nothing for a machine that has ended', () => {
    const ended = machine({ ended_at: new Date(NOW.getTime() - 60_000) });
    expect(allocationUsage(ended, NOW, NOW)).toEqual({ memory_mb_usage: 0, vcpu_usage: 0 });
  });

  it('reports nothing for a machine that has not started yet', () => {
    const future = machine({ started_at: new Date(NOW.getTime() + 60_000) });
    expect(allocationUsage(future, NOW, NOW)).toEqual({ memory_mb_usage: 0, vcpu_usage: 0 });
  });

  it('counts a machine starting exactly now and drops one ending exactly now', () => {
    expect(allocationUsage(machine({ started_at: NOW }), NOW, NOW).vcpu_usage).toBe(4);
    expect(allocationUsage(machine({ ended_at: NOW }), NOW, NOW).vcpu_usage).toBe(0);
  });

  it('depends only on the machine and the instant', () => {
    const vm = machine({ ended_at: new Date(NOW.getTime() + HOUR) });
    const first = allocationUsage(vm, NOW, NOW);
    const second = allocationUsage(vm, new Date(NOW.getTime()), NOW);
    expect(second).toEqual(first);
    expect(allocationUsage(vm, new Date(NOW.getTime() + 2 * HOUR), NOW)).toEqual({
      memory_mb_usage: 0,
      vcpu_usage: 0,
    });
  });
});

describe('integratedUsage', () => {
  it('multiplies size by the hours inside the window', () => {
    const vm = machine({ started_at: new Date(NOW.getTime() - 2 * HOUR) });
    const windowStart = new Date(NOW.getTime() - HOUR);
    expect(integratedUsage(vm, NOW, windowStart)).toEqual({ memory_mb_usage: 2048, vcpu_usage: 4 });
  });

  it('stops counting at ended_at', () => {
    const vm = machine({
      started_at: new Date(NOW.getTime() - HOUR),
      ended_at: new Date(NOW.getTime() - HOUR / 2),
    });
    const windowStart = new Date(NOW.getTime() - 2 * HOUR);
    expect(integratedUsage(vm, NOW, windowStart)).toEqual({ memory_mb_usage: 1024, vcpu_usage: 2 });
  });

  it('never reports negative usage', () => {
    const vm = machine({ started_at: new Date(NOW.getTime() + HOUR) });
    expect(integratedUsage(vm, NOW, NOW)).toEqual({ memory_mb_usage: 0, vcpu_usage: 0 });
  });
});

describe('isSimulationModel', () => {
  it('knows both models', () => {
    expect(isSimulationModel('allocation')).toBe(true);
    expect(isSimulationModel('integrated')).toBe(true);
    expect(isSimulationModel('toString')).toBe(false);
  });
});

describe('parseSimulation', () => {
  const defaultStart = new Date('2026-10-19T08:00:00Z');

  it('derives ids from the project and domain names', () => {
    const parsed = parseSimulation(
      [
        'projects:',
        '  - name: alpha-project',
        '    domain: alpha',
        '    machines:',
        '      - memory_mb: 2048',
        '        vcpus: 4',
        '        started_at: "2026-10-19T09:00:00Z"',
        '        ended_at: ongoing',
      ].join('\n'),
      defaultStart
    );

    expect(parsed.issues).toEqual([]);
    expect(parsed.projects).toHaveLength(1);
    expect(parsed.projects[0].project).toEqual({
      project_id: simulatedId('alpha-project'),
      project_name: 'alpha-project',
      domain_id: simulatedId('alpha'),
      domain_name: 'alpha',
    });
    expect(parsed.projects[0].machines[0].started_at.toISOString()).toBe('2026-10-19T09:00:00.000Z');
    expect(parsed.projects[0].machines[0].ended_at).toBeNull();
  });

  it('keeps explicit ids and fills defaults', () => {
    const parsed = parseSimulation(
      [
        'projects:',
        '  - name: beta-project',
        '    project_id: custom-id',
        '    domain_id: custom-domain',
        '    machines:',
        '      - memory_mb: 512',
        '        vcpus: 1',
        '        metadata:',
        '          project_name: hosted',
      ].join('\n'),
      defaultStart
    );

    const [{ project, machines }] = parsed.projects;
    expect(project.project_id).toBe('custom-id');
    expect(project.domain_id).toBe('custom-domain');
    expect(project.domain_name).toBe('');
    expect(machines[0].started_at).toEqual(defaultStart);
    expect(machines[0].ended_at).toBeNull();
    expect(machines[0].metadata).toEqual({ project_name: 'hosted' });
  });

  it('skips malformed entries and keeps the rest', () => {
    const parsed = parseSimulation(
      [
        'projects:',
        '  - name: gamma',
        '    machines:',
        '      - memory_mb: 1024',
        '        vcpus: -1',
        '      - memory_mb: 1024',
        '        vcpus: 2',
        '      - memory_mb: 1024',
        '        vcpus: 2',
        '        started_at: "2026-10-19T10:00:00Z"',
        '        ended_at: "2026-10-19T09:00:00Z"',
        '      - memory_mb: 1024',
        '        vcpus: 2',
        '        started_at: "not a date"',
        '  - domain: nameless',
      ].join('\n'),
      defaultStart
    );

    expect(parsed.projects).toHaveLength(1);
    expect(parsed.projects[0].machines).toHaveLength(1);
    expect(parsed.projects[0].machines[0].vcpus).toBe(2);
    expect(parsed.issues.map((issue) => issue.entry)).toEqual([
      'projects[0].machines[0]',
      'projects[0].machines[2]',
      'projects[0].machines[3]',
      'projects[1]',
    ]);
    expect(parsed.issues[1].message).toBe('projects[0].machines[2]: ended_at lies before started_at');
    expect(parsed.issues[2].message).toBe('projects[0].machines[3]: Unrecognized started_at "not a date"');
  });

  it('rejects a document without a project list', () => {
    expect(() => parseSimulation('machines: []', defaultStart)).toThrow(/Invalid simulation file/);
    expect(() => parseSimulation('', defaultStart)).toThrow(/Invalid simulation file/);
  });

  it('produces 16 hex character ids', () => {
    expect(simulatedId('alpha')).toMatch(/^[0-9a-f]{16}$/);
    expect(simulatedId('alpha')).not.toBe(simulatedId('beta'));
  });
});
