import { Type, type Static } from '@sinclair/typebox';

/**
 * Weight table, as served by the weight endpoint and stored in the
 * dummy weights file
 */
export const WeightTableSchema = Type.Object({
  mb_weight: Type.Number({ minimum: 0 }),
  vcpu_weight: Type.Number({ minimum: 0 }),
});

/**
 * Start date endpoint response: either a bare date string or an object
 */
export const StartDateResponseSchema = Type.Union([
  Type.String({ minLength: 1 }),
  Type.Object({
    start_date: Type.String({ minLength: 1 }),
  }),
]);

export type StartDateResponse = Static<typeof StartDateResponseSchema>;

// ---------------------------------------------------------------------------
// OpenStack (Keystone v3 / Nova) responses, only the fields we read
// ---------------------------------------------------------------------------

export const CatalogEndpointSchema = Type.Object({
  interface: Type.String(),
  url: Type.String({ minLength: 1 }),
  region_id: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  region: Type.Optional(Type.Union([Type.String(), Type.Null()])),
});

export const TokenResponseSchema = Type.Object({
  token: Type.Object({
    expires_at: Type.String(),
    catalog: Type.Array(
      Type.Object({
        type: Type.String(),
        endpoints: Type.Array(CatalogEndpointSchema),
      })
    ),
  }),
});

export type TokenResponse = Static<typeof TokenResponseSchema>;

export const DomainSchema = Type.Object({
  domain: Type.Object({
    id: Type.String(),
    name: Type.String(),
  }),
});

export const ProjectListSchema = Type.Object({
  projects: Type.Array(
    Type.Object({
      id: Type.String(),
      name: Type.String(),
      domain_id: Type.String(),
    })
  ),
});

export const ServerUsageSchema = Type.Object({
  instance_id: Type.String(),
  hours: Type.Number(),
  vcpus: Type.Number(),
  memory_mb: Type.Number(),
});

export type ServerUsage = Static<typeof ServerUsageSchema>;

/**
 * Nova answers `{"tenant_usage": {}}` for a project without usage
 */
export const TenantUsageSchema = Type.Object({
  tenant_usage: Type.Object({
    server_usages: Type.Optional(Type.Array(ServerUsageSchema)),
  }),
});

export const ServerDetailListSchema = Type.Object({
  servers: Type.Array(
    Type.Object({
      id: Type.String(),
      metadata: Type.Optional(Type.Record(Type.String(), Type.String())),
    })
  ),
});

// ---------------------------------------------------------------------------
// Scrape server
// ---------------------------------------------------------------------------

export const HealthResponseSchema = Type.Object({
  status: Type.Literal('ok'),
  tick: Type.Union([Type.Number(), Type.Null()]),
});

export const SnapshotResponseSchema = Type.Object({
  tick: Type.Number(),
  created_at: Type.String(),
  weights: WeightTableSchema,
  metrics: Type.Array(
    Type.Object({
      name: Type.Union([Type.Literal('total_memory_mb_usage'), Type.Literal('total_vcpus_usage')]),
      value: Type.Number(),
      labels: Type.Object({
        project_id: Type.String(),
        project_name: Type.String(),
        domain_id: Type.String(),
        domain_name: Type.String(),
      }),
    })
  ),
});

export type SnapshotResponse = Static<typeof SnapshotResponseSchema>;

export const ErrorResponseSchema = Type.Object({
  error: Type.String(),
});
