import type { Project } from '../types/usage';

export interface DomainFilterOptions {
  /** Exact domain id; overrides domainNames when set */
  domainId?: string;
  domainNames?: readonly string[];
}

/**
 * Decides which projects are exported
 *
 * A configured domain id wins over the name set. An empty configuration
 * accepts every project the source can read.
 */
export class DomainFilter {
  readonly domainId: string | undefined;
  readonly domainNames: ReadonlySet<string>;

  constructor(options: DomainFilterOptions = {}) {
    this.domainId = options.domainId || undefined;
    this.domainNames = new Set((options.domainNames ?? []).filter((name) => name.length > 0));
  }

  accepts(project: Project): boolean {
    if (this.domainId !== undefined) {
      return project.domain_id === this.domainId;
    }
    if (this.domainNames.size === 0) {
      return true;
    }
    return this.domainNames.has(project.domain_name);
  }

  describe(): string {
    if (this.domainId !== undefined) {
      return `domain id ${this.domainId}`;
    }
    if (this.domainNames.size === 0) {
      return 'all readable projects';
    }
    return `domains ${[...this.domainNames].join(', ')}`;
  }
}
