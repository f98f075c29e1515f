import type { Static, TSchema } from '@sinclair/typebox';
import { TokenResponseSchema, type TokenResponse } from '../api/schemas';
import { validate } from '../api/validation';
import { ConfigurationError, SourceUnavailableError, toSourceUnavailable } from '../utils/errors';
import type { FetchFn } from '../utils/http';

/**
 * Keystone password credentials, read from the usual OS_* variables
 * (the ones an openrc file exports)
 */
export interface OpenStackCredentials {
  authUrl: string;
  username: string;
  password: string;
  userDomainName: string;
  projectId?: string;
  projectName?: string;
  projectDomainId?: string;
  projectDomainName?: string;
  regionName?: string;
  interface: string;
}

export function credentialsFromEnv(env: NodeJS.ProcessEnv): OpenStackCredentials {
  const required = ['OS_AUTH_URL', 'OS_USERNAME', 'OS_PASSWORD'] as const;
  const missing: string[] = required.filter((name) => !env[name]);
  if (!env.OS_PROJECT_ID && !env.OS_PROJECT_NAME) {
    missing.push('OS_PROJECT_NAME');
  }
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Could not authenticate against OpenStack, missing ${missing.join(', ')}. ` +
        'Consider using the dummy mode (--dummy-data) for testing'
    );
  }

  return {
    authUrl: env.OS_AUTH_URL ?? '',
    username: env.OS_USERNAME ?? '',
    password: env.OS_PASSWORD ?? '',
    userDomainName: env.OS_USER_DOMAIN_NAME || 'Default',
    projectId: env.OS_PROJECT_ID || undefined,
    projectName: env.OS_PROJECT_NAME || undefined,
    projectDomainId: env.OS_PROJECT_DOMAIN_ID || undefined,
    projectDomainName: env.OS_PROJECT_DOMAIN_NAME || undefined,
    regionName: env.OS_REGION_NAME || undefined,
    interface: normalizeInterface(env.OS_INTERFACE),
  };
}

/** `publicURL` (v2 catalog naming) and `public` mean the same endpoint */
function normalizeInterface(value: string | undefined): string {
  if (!value) {
    return 'public';
  }
  return value.replace(/URL$/, '');
}

/** Nova only accepts naive timestamps such as 2026-10-19T08:00:00.000 */
export function novaTimestamp(date: Date): string {
  return date.toISOString().replace('Z', '');
}

interface Session {
  token: string;
  expiresAt: number;
  computeUrl: string;
}

/** A Keystone or Nova request answered with an error status */
export class OpenStackRequestError extends SourceUnavailableError {
  readonly status: number;

  constructor(status: number, message: string) {
    super('openstack', message);
    this.name = 'OpenStackRequestError';
    this.status = status;
  }
}

const TOKEN_EXPIRY_MARGIN_MS = 60 * 1000;

/**
 * Minimal Keystone v3 / Nova client
 *
 * Authenticates lazily, keeps the token until shortly before it expires and
 * forgets it when a request is rejected with 401. Every request is bounded by
 * the configured timeout.
 */
export class OpenStackClient {
  private session: Session | undefined;
  private readonly identityUrl: string;

  constructor(
    private readonly credentials: OpenStackCredentials,
    private readonly timeoutMs: number,
    private readonly fetchFn: FetchFn = fetch
  ) {
    const base = credentials.authUrl.replace(/\/+$/, '');
    this.identityUrl = base.endsWith('/v3') ? base : `${base}/v3`;
  }

  async identity<S extends TSchema>(path: string, schema: S): Promise<Static<S>> {
    const session = await this.ensureSession();
    return this.request(`${this.identityUrl}${path}`, session.token, schema);
  }

  async compute<S extends TSchema>(path: string, schema: S): Promise<Static<S>> {
    const session = await this.ensureSession();
    return this.request(`${session.computeUrl}${path}`, session.token, schema);
  }

  private async request<S extends TSchema>(url: string, token: string, schema: S): Promise<Static<S>> {
    const response = await this.fetchFn(url, {
      headers: { 'X-Auth-Token': token, Accept: 'application/json' },
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (response.status === 401) {
      this.session = undefined;
      throw new OpenStackRequestError(response.status, `Token rejected for ${url}`);
    }
    if (!response.ok) {
      throw new OpenStackRequestError(response.status, `GET ${url} failed with status ${response.status}`);
    }

    const body = validate(schema, await response.json());
    if (!body.valid) {
      throw new SourceUnavailableError('openstack', `Unexpected response from ${url} (${body.reason})`);
    }
    return body.value;
  }

  private async ensureSession(): Promise<Session> {
    if (this.session && Date.now() < this.session.expiresAt - TOKEN_EXPIRY_MARGIN_MS) {
      return this.session;
    }
    try {
      this.session = await this.authenticate();
    } catch (err) {
      throw toSourceUnavailable('openstack', err);
    }
    return this.session;
  }

  private async authenticate(): Promise<Session> {
    const response = await this.fetchFn(`${this.identityUrl}/auth/tokens`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
      body: JSON.stringify(this.authRequest()),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new SourceUnavailableError('openstack', `Authentication failed with status ${response.status}`);
    }
    const token = response.headers.get('X-Subject-Token');
    if (!token) {
      throw new SourceUnavailableError('openstack', 'Authentication response carries no X-Subject-Token');
    }

    const body = validate(TokenResponseSchema, await response.json());
    if (!body.valid) {
      throw new SourceUnavailableError('openstack', `Unexpected token response (${body.reason})`);
    }

    return {
      token,
      expiresAt: new Date(body.value.token.expires_at).getTime(),
      computeUrl: this.computeEndpoint(body.value),
    };
  }

  private authRequest() {
    const { credentials } = this;
    const projectDomain = credentials.projectDomainId
      ? { id: credentials.projectDomainId }
      : { name: credentials.projectDomainName ?? credentials.userDomainName };
    const project = credentials.projectId
      ? { id: credentials.projectId }
      : { name: credentials.projectName, domain: projectDomain };

    return {
      auth: {
        identity: {
          methods: ['password'],
          password: {
            user: {
              name: credentials.username,
              password: credentials.password,
              domain: { name: credentials.userDomainName },
            },
          },
        },
        scope: { project },
      },
    };
  }

  private computeEndpoint(response: TokenResponse): string {
    const { regionName } = this.credentials;
    const service = response.token.catalog.find((entry) => entry.type === 'compute');
    const endpoint = service?.endpoints.find(
      (candidate) =>
        candidate.interface === this.credentials.interface &&
        (!regionName || candidate.region_id === regionName || candidate.region === regionName)
    );
    if (!endpoint) {
      throw new SourceUnavailableError(
        'openstack',
        `No ${this.credentials.interface} compute endpoint in the service catalog`
      );
    }
    return endpoint.url.replace(/\/+$/, '');
  }
}
