export interface ConnectionConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password?: string;
  ssl?: boolean;
  connectTimeoutMs?: number;
}

export type EndpointKind = 'pooler' | 'api-pooler' | 'direct';

/** A ranked connection candidate for one environment. */
export interface Endpoint {
  readonly host: string;
  readonly port: number;
  readonly user: string;
  readonly label: string;
  readonly kind: EndpointKind;
}

export interface EnvironmentCredentials {
  name: string;
  projectRef: string;
  password: string;
  poolerRegion: string;
  poolerPort: number;
  accessToken?: string;
  poolerHost?: string;
}

export interface ColumnDescriptor {
  schema: string;
  table: string;
  name: string;
  dataType: string;
  formattedType: string;
  isNullable: boolean;
  defaultExpr: string | null;
  /** Set for identity columns; their values come from an implicit sequence. */
  identity: IdentityKind | null;
  ordinalPosition: number;
}

export type IdentityKind = 'ALWAYS' | 'BY DEFAULT';

export type PolicyCommand = 'SELECT' | 'INSERT' | 'UPDATE' | 'DELETE' | 'ALL';

export interface PolicyDescriptor {
  schema: string;
  table: string;
  policyName: string;
  command: PolicyCommand;
  roles: string[]; // sorted, compared as a set
  usingExpr: string | null;
  checkExpr: string | null;
  permissive: boolean;
}

export type GrantObjectType = 'TABLE' | 'SEQUENCE' | 'FUNCTION' | 'SCHEMA';

export interface GrantDescriptor {
  schema: string;
  object: string;
  objectType: GrantObjectType;
  grantee: string;
  privilege: string;
  isGrantable: boolean;
}

export type ConstraintType = 'PRIMARY KEY' | 'FOREIGN KEY' | 'UNIQUE' | 'CHECK' | 'EXCLUDE';

export interface ConstraintDescriptor {
  schema: string;
  table: string;
  name: string;
  type: ConstraintType;
  definition: string;
}

export interface TableDescriptor {
  schema: string;
  name: string;
  rlsEnabled: boolean;
  rlsForced: boolean;
  primaryKey: string[];
}

/**
 * A standalone or column-owned sequence. Sequences behind identity columns
 * are not listed; they travel with their column.
 */
export interface SequenceDescriptor {
  schema: string;
  name: string;
  dataType: string;
  increment: string;
  minValue: string;
  maxValue: string;
  start: string;
  cycle: boolean;
  /** The column whose drop also drops the sequence. */
  ownedBy: { schema: string; table: string; column: string } | null;
}

export interface ExtensionDescriptor {
  name: string;
  schema: string;
  version: string;
}

export interface ScheduledJobDescriptor {
  jobName: string;
  schedule: string;
  command: string;
  active: boolean;
}

/** Normalized, point-in-time capture of one database. Every list is sorted by key. */
export interface Snapshot {
  capturedAt: string;
  tables: TableDescriptor[];
  sequences: SequenceDescriptor[];
  columns: ColumnDescriptor[];
  constraints: ConstraintDescriptor[];
  policies: PolicyDescriptor[];
  grants: GrantDescriptor[];
  extensions: ExtensionDescriptor[];
  scheduledJobs: ScheduledJobDescriptor[];
}

export type SyncScope = 'schema-only' | 'schema-and-data' | 'data-only';
export type DataMode = 'incremental' | 'replace';

export interface SyncMode {
  readonly scope: SyncScope;
  readonly data: DataMode;
}

export interface ReconciliationConfig {
  readonly mode: SyncMode;
  readonly excludedSchemas: readonly string[];
  readonly managedRoles: readonly string[];
  readonly includeUsers: boolean;
  readonly autoConfirm: boolean;
  readonly dryRun: boolean;
  /** Dump the whole target with pg_dump before applying anything. */
  readonly backup: boolean;
  readonly migrationDir?: string;
  readonly dataTables?: readonly string[];
  readonly connectTimeoutMs: number;
}

/** A schema-qualified table reference. */
export interface TableRef {
  schema: string;
  name: string;
}
