import { z } from 'zod';
import { ReconciliationConfig, SyncMode } from '../types/index.js';
import { ConfigurationError } from '../utils/errors.js';

/** Platform-managed schemas that are never compared or migrated. */
export const DEFAULT_EXCLUDED_SCHEMAS: readonly string[] = [
  'pg_catalog',
  'information_schema',
  'pg_toast',
  'auth',
  'storage',
  'realtime',
  'supabase_functions',
  'supabase_migrations',
  'extensions',
  'graphql',
  'graphql_public',
  'pgbouncer',
  'pgsodium',
  'pgsodium_masks',
  'vault',
  'net',
  'cron',
  '_realtime',
  '_analytics',
];

export const DEFAULT_MANAGED_ROLES: readonly string[] = [
  'postgres',
  'supabase_admin',
  'supabase_auth_admin',
  'supabase_storage_admin',
];

export const USER_TABLES: readonly string[] = ['auth.users', 'auth.identities'];

const optionsSchema = z
  .object({
    data: z.boolean().default(false),
    replaceData: z.boolean().default(false),
    users: z.boolean().default(false),
    schemaOnly: z.boolean().default(false),
    dataOnly: z.boolean().default(false),
    autoConfirm: z.boolean().default(false),
    dryRun: z.boolean().default(false),
    backup: z.boolean().default(false),
    migrationDir: z.string().optional(),
    tables: z
      .string()
      .optional()
      .transform(t => (t ? t.split(',').map(s => s.trim()).filter(Boolean) : undefined)),
    excludeSchemas: z
      .string()
      .optional()
      .transform(s => (s ? s.split(',').map(v => v.trim()).filter(Boolean) : [])),
    connectTimeoutMs: z.number().int().positive().default(10000),
  })
  .refine(o => !(o.schemaOnly && o.dataOnly), {
    message: '--schema-only and --data-only cannot be combined',
    path: ['schemaOnly'],
  });

export type ReconcileOptions = z.input<typeof optionsSchema>;

export function resolveSyncMode(opts: { data?: boolean; replaceData?: boolean; users?: boolean; schemaOnly?: boolean; dataOnly?: boolean }): SyncMode {
  const wantsData = Boolean(opts.data || opts.replaceData || opts.users);
  const scope: SyncMode['scope'] = opts.dataOnly ? 'data-only' : opts.schemaOnly || !wantsData ? 'schema-only' : 'schema-and-data';
  return Object.freeze({ scope, data: opts.replaceData ? 'replace' : 'incremental' });
}

export function isSchemaExcluded(schema: string, excluded: readonly string[]): boolean {
  return excluded.includes(schema) || schema.startsWith('pg_temp_') || schema.startsWith('pg_toast_temp_');
}

/** Builds the immutable per-run configuration from CLI-style options. */
export function buildReconciliationConfig(options: ReconcileOptions): ReconciliationConfig {
  const parsed = optionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues.map(i => i.message).join('; '), { errors: parsed.error.issues });
  }
  const o = parsed.data;
  const mode = resolveSyncMode(o);

  return Object.freeze({
    mode,
    excludedSchemas: Object.freeze([...new Set([...DEFAULT_EXCLUDED_SCHEMAS, ...o.excludeSchemas])]),
    managedRoles: DEFAULT_MANAGED_ROLES,
    includeUsers: o.users,
    autoConfirm: o.autoConfirm,
    dryRun: o.dryRun,
    backup: o.backup,
    migrationDir: o.migrationDir,
    dataTables: o.tables ? Object.freeze(o.tables) : undefined,
    connectTimeoutMs: o.connectTimeoutMs,
  });
}
