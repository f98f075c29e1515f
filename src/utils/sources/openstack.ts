import { DomainSchema, ProjectListSchema, ServerDetailListSchema, TenantUsageSchema } from '../../api/schemas';
import { novaTimestamp, OpenStackRequestError, type OpenStackClient } from '../../config/openstack';
import { splitSimpleVmUsage, type InstanceUsage, type SimpleVmOptions } from '../simplevm';
import { toSourceUnavailable } from '../errors';
import type { DomainFilter } from '../domain-filter';
import type { UsageSource } from '../../types/sources';
import type { Project, UsageSample } from '../../types/usage';
import type { Logger } from '../../config/logger';

/**
 * Usage read from Nova's os-simple-tenant-usage API
 *
 * Reported figures are MB-hours and vCPU-hours over [windowStart, now).
 * Projects are filtered before their usage is requested.
 */
export class OpenStackUsageSource implements UsageSource {
  readonly name = 'openstack';

  constructor(
    private readonly client: OpenStackClient,
    private readonly simpleVm: SimpleVmOptions,
    private readonly logger: Logger
  ) {}

  async collect(filter: DomainFilter, windowStart: Date, now: Date): Promise<UsageSample[]> {
    try {
      const projects = (await this.listProjects(filter)).filter((project) => filter.accepts(project));

      const samples: UsageSample[] = [];
      for (const project of projects) {
        const instances = await this.instanceUsages(project, windowStart, now);
        samples.push(...splitSimpleVmUsage(project, instances, this.simpleVm));
      }
      return samples;
    } catch (err) {
      throw toSourceUnavailable(this.name, err);
    }
  }

  private async listProjects(filter: DomainFilter): Promise<Project[]> {
    const query = filter.domainId ? `?domain_id=${encodeURIComponent(filter.domainId)}` : '';
    const { projects } = await this.client.identity(`/projects${query}`, ProjectListSchema);

    const domainNames = new Map<string, string>();
    for (const domainId of new Set(projects.map((project) => project.domain_id))) {
      domainNames.set(domainId, await this.domainName(domainId, filter));
    }

    return projects.map((project) => ({
      project_id: project.id,
      project_name: project.name,
      domain_id: project.domain_id,
      domain_name: domainNames.get(project.domain_id) ?? '',
    }));
  }

  /**
   * Reading a domain needs more than a project reader role. Without it the
   * name label stays empty, unless projects are selected by domain name.
   */
  private async domainName(domainId: string, filter: DomainFilter): Promise<string> {
    try {
      const { domain } = await this.client.identity(`/domains/${encodeURIComponent(domainId)}`, DomainSchema);
      return domain.name;
    } catch (err) {
      if (!(err instanceof OpenStackRequestError) || (err.status !== 403 && err.status !== 404)) {
        throw err;
      }
      if (filter.domainId === undefined && filter.domainNames.size > 0) {
        throw err;
      }
      this.logger.warn({ domainId, status: err.status }, 'Cannot read domain, exporting it without a name');
      return '';
    }
  }

  private async instanceUsages(project: Project, windowStart: Date, now: Date): Promise<InstanceUsage[]> {
    const params = new URLSearchParams({
      start: novaTimestamp(windowStart),
      end: novaTimestamp(now),
      detailed: '1',
    });
    const { tenant_usage } = await this.client.compute(
      `/os-simple-tenant-usage/${encodeURIComponent(project.project_id)}?${params.toString()}`,
      TenantUsageSchema
    );

    const metadata = await this.instanceMetadata(project);

    return (tenant_usage.server_usages ?? []).map((server) => ({
      memory_mb_usage: server.memory_mb * server.hours,
      vcpu_usage: server.vcpus * server.hours,
      metadata: metadata.get(server.instance_id) ?? {},
    }));
  }

  /** Metadata is only needed to split the SimpleVM umbrella project */
  private async instanceMetadata(project: Project): Promise<Map<string, Record<string, string>>> {
    if (!this.simpleVm.projectId || project.project_id !== this.simpleVm.projectId) {
      return new Map();
    }
    const { servers } = await this.client.compute(
      `/servers/detail?all_tenants=false&project_id=${encodeURIComponent(project.project_id)}`,
      ServerDetailListSchema
    );
    return new Map(servers.map((server) => [server.id, server.metadata ?? {}]));
  }
}
