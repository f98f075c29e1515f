import type { Project, UsageSample } from '../types/usage';

/**
 * SimpleVM hosts many logical projects inside one umbrella cloud project.
 * Each machine names its logical project in a metadata key.
 */
export interface SimpleVmOptions {
  /** Umbrella project id; relabeling is off when unset */
  projectId?: string;
  /** Metadata key holding the sub-project name */
  tag: string;
}

export interface InstanceUsage {
  memory_mb_usage: number;
  vcpu_usage: number;
  metadata: Record<string, string>;
}

/**
 * Turn the instance usages of one project into usage samples
 *
 * Ordinary projects yield a single sample. The umbrella project yields one
 * sample per distinct tag value, labeled with that value as project name,
 * and its own sample only for untagged instances (or when it has none).
 */
export function splitSimpleVmUsage(
  project: Project,
  instances: readonly InstanceUsage[],
  options: SimpleVmOptions
): UsageSample[] {
  const isUmbrella = options.projectId !== undefined && project.project_id === options.projectId;

  const own: UsageSample = { project, memory_mb_usage: 0, vcpu_usage: 0 };
  const hosted = new Map<string, UsageSample>();
  let untagged = 0;

  for (const instance of instances) {
    const subProject = isUmbrella ? instance.metadata[options.tag] : undefined;

    let target = own;
    if (!subProject) {
      untagged++;
    } else {
      const existing = hosted.get(subProject);
      if (existing) {
        target = existing;
      } else {
        target = {
          project: { ...project, project_name: subProject },
          memory_mb_usage: 0,
          vcpu_usage: 0,
        };
        hosted.set(subProject, target);
      }
    }

    target.memory_mb_usage += instance.memory_mb_usage;
    target.vcpu_usage += instance.vcpu_usage;
  }

  if (untagged === 0 && hosted.size > 0) {
    return [...hosted.values()];
  }
  return [own, ...hosted.values()];
}
