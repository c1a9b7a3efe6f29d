import {
  columnKey,
  constraintKey,
  extensionKey,
  grantKey,
  jobKey,
  policyKey,
  sequenceKey,
  sortByKey,
  tableKey,
} from '../../core/keys.js';
import {
  ColumnDescriptor,
  ConstraintDescriptor,
  ConstraintType,
  ExtensionDescriptor,
  GrantDescriptor,
  GrantObjectType,
  IdentityKind,
  PolicyCommand,
  PolicyDescriptor,
  ScheduledJobDescriptor,
  SequenceDescriptor,
  Snapshot,
  TableDescriptor,
  TableRef,
} from '../../types/index.js';
import { IntrospectionFailure, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { qualify, quoteIdent } from '../../utils/sql.js';
import { IDbConnection, ISchemaInspector } from '../interfaces.js';

function schemaFilter(column: string): string {
  return `${column} NOT LIKE 'pg\\_%' AND ${column} <> ALL($1::text[])`;
}

const POLICY_COMMANDS: Record<string, PolicyCommand> = {
  r: 'SELECT',
  a: 'INSERT',
  w: 'UPDATE',
  d: 'DELETE',
  '*': 'ALL',
};

const CONSTRAINT_TYPES: Record<string, ConstraintType> = {
  p: 'PRIMARY KEY',
  f: 'FOREIGN KEY',
  u: 'UNIQUE',
  c: 'CHECK',
  x: 'EXCLUDE',
};

const IDENTITY_KINDS: Record<string, IdentityKind> = {
  a: 'ALWAYS',
  d: 'BY DEFAULT',
};

type TableRow = { schema: string; name: string; rlsEnabled: boolean; rlsForced: boolean; primaryKey: string[] };
type PolicyRow = Omit<PolicyDescriptor, 'command'> & { cmd: string };
type ConstraintRow = Omit<ConstraintDescriptor, 'type'> & { contype: string };
type GrantRow = Omit<GrantDescriptor, 'objectType'> & { objectType: string };
type ColumnRow = Omit<ColumnDescriptor, 'identity'> & { attidentity: string };
type SequenceRow = Omit<SequenceDescriptor, 'ownedBy'> & {
  ownerSchema: string | null;
  ownerTable: string | null;
  ownerColumn: string | null;
};
type CountRow = { count: string | number };

export function policyCommandFromCatalog(letter: string): PolicyCommand {
  const command = POLICY_COMMANDS[letter];
  if (!command) throw new IntrospectionFailure(`Unknown policy command "${letter}" in pg_policy`);
  return command;
}

export interface InspectorOptions {
  excludedSchemas: readonly string[];
  managedRoles: readonly string[];
}

/**
 * Builds normalized snapshots from catalog metadata. Every query is read-only
 * and skips system and excluded schemas.
 */
export class PostgresInspector implements ISchemaInspector {
  constructor(private options: InspectorOptions) {}

  async introspect(db: IDbConnection): Promise<Snapshot> {
    const label = db.endpoint?.label ?? 'connection';
    logger.info(`Introspecting catalog via ${label}`);

    const tables = await this.getTables(db);
    const sequences = await this.getSequences(db);
    const columns = await this.getColumns(db);
    const constraints = await this.getConstraints(db);
    const policies = await this.getPolicies(db);
    const grants = await this.getGrants(db);
    const extensions = await this.getExtensions(db);
    const scheduledJobs = extensions.some(e => e.name === 'pg_cron') ? await this.getScheduledJobs(db) : [];

    logger.info(
      { tables: tables.length, sequences: sequences.length, columns: columns.length, policies: policies.length, grants: grants.length },
      'Introspection complete'
    );

    return {
      capturedAt: new Date().toISOString(),
      tables,
      sequences,
      columns,
      constraints,
      policies,
      grants,
      extensions,
      scheduledJobs,
    };
  }

  async listTables(db: IDbConnection): Promise<TableRef[]> {
    const tables = await this.getTables(db);
    return tables.map(t => ({ schema: t.schema, name: t.name }));
  }

  async countRows(db: IDbConnection, table: TableRef): Promise<number> {
    const rows = await this.run<CountRow>(db, 'row count', `SELECT count(*) AS count FROM ${qualify(table.schema, table.name)}`, false);
    return Number(rows[0]?.count ?? 0);
  }

  async countNulls(db: IDbConnection, table: TableRef, column: string): Promise<number> {
    const rows = await this.run<CountRow>(
      db,
      'null count',
      `SELECT count(*) AS count FROM ${qualify(table.schema, table.name)} WHERE ${quoteIdent(column)} IS NULL`,
      false
    );
    return Number(rows[0]?.count ?? 0);
  }

  private async getTables(db: IDbConnection): Promise<TableDescriptor[]> {
    const rows = await this.run<TableRow>(db, 'tables', `
      SELECT
        n.nspname AS schema,
        c.relname AS name,
        c.relrowsecurity AS "rlsEnabled",
        c.relforcerowsecurity AS "rlsForced",
        COALESCE((
          SELECT array_agg(a.attname::text ORDER BY array_position(con.conkey, a.attnum))
          FROM pg_constraint con
          JOIN pg_attribute a ON a.attrelid = con.conrelid AND a.attnum = ANY(con.conkey)
          WHERE con.conrelid = c.oid AND con.contype = 'p'
        ), ARRAY[]::text[]) AS "primaryKey"
      FROM pg_class c
      JOIN pg_namespace n ON n.oid = c.relnamespace
      WHERE c.relkind IN ('r', 'p')
        AND NOT c.relispartition
        AND ${schemaFilter('n.nspname')}
    `);
    return sortByKey(rows, tableKey);
  }

  /** Sequences, leaving out the implicit ones behind identity columns. */
  private async getSequences(db: IDbConnection): Promise<SequenceDescriptor[]> {
    const rows = await this.run<SequenceRow>(db, 'sequences', `
      SELECT
        n.nspname AS schema,
        c.relname AS name,
        format_type(s.seqtypid, NULL) AS "dataType",
        s.seqincrement::text AS increment,
        s.seqmin::text AS "minValue",
        s.seqmax::text AS "maxValue",
        s.seqstart::text AS start,
        s.seqcycle AS cycle,
        tn.nspname AS "ownerSchema",
        tc.relname AS "ownerTable",
        ta.attname AS "ownerColumn"
      FROM pg_sequence s
      JOIN pg_class c ON c.oid = s.seqrelid
      JOIN pg_namespace n ON n.oid = c.relnamespace
      LEFT JOIN pg_depend d
        ON d.classid = 'pg_class'::regclass AND d.objid = c.oid
       AND d.refclassid = 'pg_class'::regclass AND d.deptype = 'a'
      LEFT JOIN pg_class tc ON tc.oid = d.refobjid
      LEFT JOIN pg_namespace tn ON tn.oid = tc.relnamespace
      LEFT JOIN pg_attribute ta ON ta.attrelid = d.refobjid AND ta.attnum = d.refobjsubid
      WHERE NOT EXISTS (
          SELECT 1 FROM pg_depend i
          WHERE i.classid = 'pg_class'::regclass AND i.objid = c.oid AND i.deptype = 'i'
        )
        AND ${schemaFilter('n.nspname')}
    `);

    const sequences = rows.map(({ ownerSchema, ownerTable, ownerColumn, ...rest }) => ({
      ...rest,
      ownedBy: ownerSchema && ownerTable && ownerColumn ? { schema: ownerSchema, table: ownerTable, column: ownerColumn } : null,
    }));
    return sortByKey(sequences, sequenceKey);
  }

  private async getColumns(db: IDbConnection): Promise<ColumnDescriptor[]> {
    const rows = await this.run<ColumnRow>(db, 'columns', `
      SELECT
        c.table_schema AS schema,
        c.table_name AS "table",
        c.column_name AS name,
        c.data_type AS "dataType",
        format_type(a.atttypid, a.atttypmod) AS "formattedType",
        c.is_nullable = 'YES' AS "isNullable",
        c.column_default AS "defaultExpr",
        a.attidentity::text AS attidentity,
        c.ordinal_position::int AS "ordinalPosition"
      FROM information_schema.columns c
      JOIN pg_namespace n ON n.nspname = c.table_schema
      JOIN pg_class cl ON cl.relnamespace = n.oid AND cl.relname = c.table_name
      JOIN pg_attribute a ON a.attrelid = cl.oid AND a.attname = c.column_name
      WHERE a.attnum > 0
        AND NOT a.attisdropped
        AND cl.relkind IN ('r', 'p')
        AND NOT cl.relispartition
        AND ${schemaFilter('c.table_schema')}
    `);

    const columns = rows.map(({ attidentity, ...rest }) => ({ ...rest, identity: IDENTITY_KINDS[attidentity] ?? null }));
    return sortByKey(columns, columnKey);
  }

  private async getConstraints(db: IDbConnection): Promise<ConstraintDescriptor[]> {
    const rows = await this.run<ConstraintRow>(db, 'constraints', `
      SELECT
        n.nspname AS schema,
        cl.relname AS "table",
        con.conname AS name,
        con.contype AS contype,
        pg_get_constraintdef(con.oid) AS definition
      FROM pg_constraint con
      JOIN pg_class cl ON cl.oid = con.conrelid
      JOIN pg_namespace n ON n.oid = cl.relnamespace
      WHERE con.contype IN ('p', 'f', 'u', 'c', 'x')
        AND cl.relkind IN ('r', 'p')
        AND ${schemaFilter('n.nspname')}
    `);

    const constraints = rows.map(({ contype, ...rest }) => {
      const type = CONSTRAINT_TYPES[contype];
      if (!type) throw new IntrospectionFailure(`Unknown constraint type "${contype}" on ${rest.schema}.${rest.table}`);
      return { ...rest, type };
    });
    return sortByKey(constraints, constraintKey);
  }

  private async getPolicies(db: IDbConnection): Promise<PolicyDescriptor[]> {
    const rows = await this.run<PolicyRow>(db, 'policies', `
      SELECT
        n.nspname AS schema,
        c.relname AS "table",
        pol.polname AS "policyName",
        pol.polcmd::text AS cmd,
        pol.polpermissive AS permissive,
        COALESCE((
          SELECT array_agg(r.rolname::text ORDER BY r.rolname)
          FROM pg_roles r
          WHERE r.oid = ANY(pol.polroles)
        ), ARRAY[]::text[]) AS roles,
        pg_get_expr(pol.polqual, pol.polrelid) AS "usingExpr",
        pg_get_expr(pol.polwithcheck, pol.polrelid) AS "checkExpr"
      FROM pg_policy pol
      JOIN pg_class c ON c.oid = pol.polrelid
      JOIN pg_namespace n ON n.oid = c.relnamespace
      WHERE ${schemaFilter('n.nspname')}
    `);

    const policies = rows.map(({ cmd, ...rest }) => ({
      ...rest,
      command: policyCommandFromCatalog(cmd),
      // the public pseudo-role (oid 0) has no pg_roles row
      roles: rest.roles.length > 0 ? [...rest.roles].sort() : ['public'],
    }));
    return sortByKey(policies, policyKey);
  }

  private async getGrants(db: IDbConnection): Promise<GrantDescriptor[]> {
    const rows = await this.run<GrantRow>(db, 'grants', `
      SELECT n.nspname AS schema, c.relname AS object, 'TABLE' AS "objectType",
             COALESCE(r.rolname, 'PUBLIC') AS grantee, acl.privilege_type AS privilege, acl.is_grantable AS "isGrantable"
      FROM pg_class c
      JOIN pg_namespace n ON n.oid = c.relnamespace
      CROSS JOIN LATERAL aclexplode(c.relacl) acl
      LEFT JOIN pg_roles r ON r.oid = acl.grantee
      WHERE c.relkind IN ('r', 'p', 'v', 'm', 'f') AND ${schemaFilter('n.nspname')}
      UNION ALL
      SELECT n.nspname, c.relname, 'SEQUENCE',
             COALESCE(r.rolname, 'PUBLIC'), acl.privilege_type, acl.is_grantable
      FROM pg_class c
      JOIN pg_namespace n ON n.oid = c.relnamespace
      CROSS JOIN LATERAL aclexplode(c.relacl) acl
      LEFT JOIN pg_roles r ON r.oid = acl.grantee
      WHERE c.relkind = 'S' AND ${schemaFilter('n.nspname')}
      UNION ALL
      SELECT n.nspname, p.proname || '(' || pg_get_function_identity_arguments(p.oid) || ')', 'FUNCTION',
             COALESCE(r.rolname, 'PUBLIC'), acl.privilege_type, acl.is_grantable
      FROM pg_proc p
      JOIN pg_namespace n ON n.oid = p.pronamespace
      CROSS JOIN LATERAL aclexplode(p.proacl) acl
      LEFT JOIN pg_roles r ON r.oid = acl.grantee
      WHERE ${schemaFilter('n.nspname')}
      UNION ALL
      SELECT n.nspname, n.nspname, 'SCHEMA',
             COALESCE(r.rolname, 'PUBLIC'), acl.privilege_type, acl.is_grantable
      FROM pg_namespace n
      CROSS JOIN LATERAL aclexplode(n.nspacl) acl
      LEFT JOIN pg_roles r ON r.oid = acl.grantee
      WHERE ${schemaFilter('n.nspname')}
    `);

    const grants: GrantDescriptor[] = [];
    for (const row of rows) {
      if (this.isManagedRole(row.grantee)) continue;
      grants.push({ ...row, objectType: this.grantObjectType(row.objectType) });
    }
    return sortByKey(grants, grantKey);
  }

  private async getExtensions(db: IDbConnection): Promise<ExtensionDescriptor[]> {
    const rows = await this.run<ExtensionDescriptor>(db, 'extensions', `
      SELECT e.extname AS name, n.nspname AS schema, e.extversion AS version
      FROM pg_extension e
      JOIN pg_namespace n ON n.oid = e.extnamespace
    `, false);
    return sortByKey(rows, extensionKey);
  }

  private async getScheduledJobs(db: IDbConnection): Promise<ScheduledJobDescriptor[]> {
    const rows = await this.run<ScheduledJobDescriptor>(db, 'scheduled jobs', `
      SELECT COALESCE(jobname, 'job_' || jobid) AS "jobName", schedule, command, active
      FROM cron.job
    `, false);
    return sortByKey(rows, jobKey);
  }

  private isManagedRole(role: string): boolean {
    return role.startsWith('pg_') || this.options.managedRoles.includes(role);
  }

  private grantObjectType(value: string): GrantObjectType {
    switch (value) {
      case 'TABLE':
      case 'SEQUENCE':
      case 'FUNCTION':
      case 'SCHEMA':
        return value;
      default:
        throw new IntrospectionFailure(`Unknown grant object type "${value}"`);
    }
  }

  private async run<T extends object>(db: IDbConnection, what: string, sql: string, filtered: boolean = true): Promise<T[]> {
    try {
      return await db.query<T>(sql, filtered ? [[...this.options.excludedSchemas]] : []);
    } catch (error) {
      throw new IntrospectionFailure(`Catalog query for ${what} failed: ${errorMessage(error)}`, sql);
    }
  }
}
