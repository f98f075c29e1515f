import { createHash } from 'crypto';
import { Type } from '@sinclair/typebox';
import { parse as parseYaml } from 'yaml';
import { validate, parseDate } from '../api/validation';
import { PartialDataError } from './errors';
import type { LifetimeSpec, Project } from '../types/usage';

/**
 * Simulated Machines
 *
 * A simulation file describes projects and the machines they run:
 *
 *   projects:
 *     - name: alpha-project
 *       domain: alpha
 *       machines:
 *         - memory_mb: 2048
 *           vcpus: 4
 *           started_at: "2026-10-01T08:00:00Z"
 *           ended_at: ongoing
 *
 * Usage is derived from these lifetimes and the evaluation instant only.
 */

export type SimulationModel = 'allocation' | 'integrated';

export interface MachineUsage {
  memory_mb_usage: number;
  vcpu_usage: number;
}

export type UsageModel = (machine: LifetimeSpec, now: Date, windowStart: Date) => MachineUsage;

const HOUR_MS = 60 * 60 * 1000;

const NO_USAGE: MachineUsage = { memory_mb_usage: 0, vcpu_usage: 0 };

export function isRunning(machine: LifetimeSpec, now: Date): boolean {
  if (machine.started_at.getTime() > now.getTime()) {
    return false;
  }
  return machine.ended_at === null || machine.ended_at.getTime() > now.getTime();
}

/**
 * Currently allocated size: full size while running, zero before start and
 * after end
 */
export const allocationUsage: UsageModel = (machine, now) => {
  if (!isRunning(machine, now)) {
    return NO_USAGE;
  }
  return { memory_mb_usage: machine.memory_mb, vcpu_usage: machine.vcpus };
};

/**
 * Size multiplied by the hours the machine existed inside [windowStart, now),
 * the same units the compute usage API reports
 */
export const integratedUsage: UsageModel = (machine, now, windowStart) => {
  const from = Math.max(machine.started_at.getTime(), windowStart.getTime());
  const until = Math.min(machine.ended_at?.getTime() ?? now.getTime(), now.getTime());
  const hours = Math.max(0, until - from) / HOUR_MS;
  return { memory_mb_usage: machine.memory_mb * hours, vcpu_usage: machine.vcpus * hours };
};

export const USAGE_MODELS: Record<SimulationModel, UsageModel> = {
  allocation: allocationUsage,
  integrated: integratedUsage,
};

export function isSimulationModel(value: string): value is SimulationModel {
  return Object.prototype.hasOwnProperty.call(USAGE_MODELS, value);
}

// ---------------------------------------------------------------------------
// File format
// ---------------------------------------------------------------------------

const SimulationFileSchema = Type.Object({
  projects: Type.Array(Type.Unknown()),
});

const ProjectEntrySchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  domain: Type.Optional(Type.String()),
  project_id: Type.Optional(Type.String({ minLength: 1 })),
  domain_id: Type.Optional(Type.String({ minLength: 1 })),
  machines: Type.Optional(Type.Array(Type.Unknown())),
});

const MachineEntrySchema = Type.Object({
  memory_mb: Type.Number({ exclusiveMinimum: 0 }),
  vcpus: Type.Number({ exclusiveMinimum: 0 }),
  started_at: Type.Optional(Type.String({ minLength: 1 })),
  ended_at: Type.Optional(Type.Union([Type.String({ minLength: 1 }), Type.Null()])),
  metadata: Type.Optional(Type.Record(Type.String(), Type.String())),
});

const ONGOING = 'ongoing';

export interface SimulatedProject {
  project: Project;
  machines: LifetimeSpec[];
}

export interface ParsedSimulation {
  projects: SimulatedProject[];
  /** Entries that were skipped */
  issues: PartialDataError[];
}

/** Last 16 hex chars of the SHA-256, the id scheme for simulated projects and domains */
export function simulatedId(name: string): string {
  return createHash('sha256').update(name).digest('hex').slice(-16);
}

/**
 * Parse the contents of a simulation file
 *
 * Throws when the document itself is unusable. A malformed project or machine
 * entry is reported in `issues` and left out.
 *
 * @param defaultStart - start of machines that do not declare `started_at`
 */
export function parseSimulation(text: string, defaultStart: Date): ParsedSimulation {
  const document: unknown = parseYaml(text);
  const file = validate(SimulationFileSchema, document);
  if (!file.valid) {
    throw new Error(`Invalid simulation file (${file.reason})`);
  }

  const projects: SimulatedProject[] = [];
  const issues: PartialDataError[] = [];

  file.value.projects.forEach((entry, projectIndex) => {
    const parsed = validate(ProjectEntrySchema, entry);
    if (!parsed.valid) {
      issues.push(new PartialDataError(`projects[${projectIndex}]`, parsed.reason));
      return;
    }

    const domainName = parsed.value.domain ?? '';
    const project: Project = {
      project_id: parsed.value.project_id ?? simulatedId(parsed.value.name),
      project_name: parsed.value.name,
      domain_id: parsed.value.domain_id ?? simulatedId(domainName),
      domain_name: domainName,
    };

    const machines: LifetimeSpec[] = [];
    (parsed.value.machines ?? []).forEach((machine, machineIndex) => {
      const label = `projects[${projectIndex}].machines[${machineIndex}]`;
      try {
        machines.push(parseMachine(machine, project, defaultStart, label));
      } catch (err) {
        if (!(err instanceof PartialDataError)) {
          throw err;
        }
        issues.push(err);
      }
    });

    projects.push({ project, machines });
  });

  return { projects, issues };
}

function parseMachine(entry: unknown, project: Project, defaultStart: Date, label: string): LifetimeSpec {
  const parsed = validate(MachineEntrySchema, entry);
  if (!parsed.valid) {
    throw new PartialDataError(label, parsed.reason);
  }
  const machine = parsed.value;

  const startedAt = machine.started_at === undefined ? defaultStart : parseDate(machine.started_at);
  if (!startedAt) {
    throw new PartialDataError(label, `Unrecognized started_at "${machine.started_at}"`);
  }

  let endedAt: Date | null = null;
  if (machine.ended_at !== undefined && machine.ended_at !== null && machine.ended_at !== ONGOING) {
    const parsedEnd = parseDate(machine.ended_at);
    if (!parsedEnd) {
      throw new PartialDataError(label, `Unrecognized ended_at "${machine.ended_at}"`);
    }
    if (parsedEnd.getTime() < startedAt.getTime()) {
      throw new PartialDataError(label, 'ended_at lies before started_at');
    }
    endedAt = parsedEnd;
  }

  return {
    project,
    memory_mb: machine.memory_mb,
    vcpus: machine.vcpus,
    started_at: startedAt,
    ended_at: endedAt,
    metadata: machine.metadata ?? {},
  };
}
