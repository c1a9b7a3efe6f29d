import {
  ColumnDescriptor,
  ConstraintDescriptor,
  ExtensionDescriptor,
  GrantDescriptor,
  IdentityKind,
  PolicyDescriptor,
  ScheduledJobDescriptor,
  SequenceDescriptor,
  TableRef,
} from '../../types/index.js';
import { qualify, quoteIdent, quoteLiteral } from '../../utils/sql.js';

const POLICY_ROLE_KEYWORDS = new Set(['public', 'current_user', 'current_role', 'session_user']);

export class PostgresDDLGenerator {
  generateTableCreate(table: TableRef, columns: ColumnDescriptor[]): string {
    const body = [...columns]
      .sort((a, b) => a.ordinalPosition - b.ordinalPosition)
      .map(col => this.formatColumn(col))
      .join(',\n  ');
    return `CREATE TABLE IF NOT EXISTS ${qualify(table.schema, table.name)} (\n  ${body}\n);`;
  }

  generateDropTable(table: TableRef): string {
    return `DROP TABLE IF EXISTS ${qualify(table.schema, table.name)} CASCADE;`;
  }

  generateAddColumn(column: ColumnDescriptor, options: { deferNotNull?: boolean } = {}): string {
    let sql = `ALTER TABLE ${qualify(column.schema, column.table)} ADD COLUMN IF NOT EXISTS ${quoteIdent(column.name)} ${column.formattedType}`;
    if (column.identity) sql += ` GENERATED ${column.identity} AS IDENTITY`;
    if (column.defaultExpr) sql += ` DEFAULT ${column.defaultExpr}`;
    if (!column.isNullable && !options.deferNotNull) sql += ' NOT NULL';
    return sql + ';';
  }

  generateDropColumn(column: ColumnDescriptor): string {
    return `ALTER TABLE ${qualify(column.schema, column.table)} DROP COLUMN IF EXISTS ${quoteIdent(column.name)};`;
  }

  generateAlterColumnType(column: ColumnDescriptor): string {
    const name = quoteIdent(column.name);
    return `ALTER TABLE ${qualify(column.schema, column.table)} ALTER COLUMN ${name} TYPE ${column.formattedType} USING ${name}::${column.formattedType};`;
  }

  generateAlterColumnNullability(column: ColumnDescriptor): string {
    return `ALTER TABLE ${qualify(column.schema, column.table)} ALTER COLUMN ${quoteIdent(column.name)} ${column.isNullable ? 'DROP NOT NULL' : 'SET NOT NULL'};`;
  }

  generateSetNotNull(table: TableRef, column: string): string {
    return `ALTER TABLE ${qualify(table.schema, table.name)} ALTER COLUMN ${quoteIdent(column)} SET NOT NULL;`;
  }

  generateAlterColumnDefault(column: ColumnDescriptor): string {
    return column.defaultExpr
      ? `ALTER TABLE ${qualify(column.schema, column.table)} ALTER COLUMN ${quoteIdent(column.name)} SET DEFAULT ${column.defaultExpr};`
      : `ALTER TABLE ${qualify(column.schema, column.table)} ALTER COLUMN ${quoteIdent(column.name)} DROP DEFAULT;`;
  }

  /** Moves a column between plain, `ALWAYS` and `BY DEFAULT` identity. */
  generateAlterIdentity(column: ColumnDescriptor, previous: IdentityKind | null): string {
    const prefix = `ALTER TABLE ${qualify(column.schema, column.table)} ALTER COLUMN ${quoteIdent(column.name)}`;
    if (!column.identity) return `${prefix} DROP IDENTITY IF EXISTS;`;
    if (!previous) return `${prefix} ADD GENERATED ${column.identity} AS IDENTITY;`;
    return `${prefix} SET GENERATED ${column.identity};`;
  }

  generateCreateSequence(sequence: SequenceDescriptor): string {
    return `CREATE SEQUENCE IF NOT EXISTS ${qualify(sequence.schema, sequence.name)} ${this.sequenceOptions(sequence)};`;
  }

  generateAlterSequence(sequence: SequenceDescriptor): string {
    return `ALTER SEQUENCE ${qualify(sequence.schema, sequence.name)} ${this.sequenceOptions(sequence)};`;
  }

  generateSequenceOwner(sequence: SequenceDescriptor): string {
    const owner = sequence.ownedBy
      ? `${qualify(sequence.ownedBy.schema, sequence.ownedBy.table)}.${quoteIdent(sequence.ownedBy.column)}`
      : 'NONE';
    return `ALTER SEQUENCE ${qualify(sequence.schema, sequence.name)} OWNED BY ${owner};`;
  }

  generateDropSequence(sequence: SequenceDescriptor): string {
    return `DROP SEQUENCE IF EXISTS ${qualify(sequence.schema, sequence.name)} CASCADE;`;
  }

  generateAddConstraint(constraint: ConstraintDescriptor): string {
    return `ALTER TABLE ${qualify(constraint.schema, constraint.table)} ADD CONSTRAINT ${quoteIdent(constraint.name)} ${constraint.definition};`;
  }

  generateDropConstraint(constraint: ConstraintDescriptor): string {
    return `ALTER TABLE ${qualify(constraint.schema, constraint.table)} DROP CONSTRAINT IF EXISTS ${quoteIdent(constraint.name)};`;
  }

  generateRowSecurity(table: TableRef, action: 'ENABLE' | 'FORCE' | 'DISABLE' | 'NO FORCE'): string {
    return `ALTER TABLE ${qualify(table.schema, table.name)} ${action} ROW LEVEL SECURITY;`;
  }

  generateDropPolicy(policy: PolicyDescriptor): string {
    return `DROP POLICY IF EXISTS ${quoteIdent(policy.policyName)} ON ${qualify(policy.schema, policy.table)};`;
  }

  generateCreatePolicy(policy: PolicyDescriptor): string {
    const parts = [`CREATE POLICY ${quoteIdent(policy.policyName)} ON ${qualify(policy.schema, policy.table)}`];
    parts.push(policy.permissive ? 'AS PERMISSIVE' : 'AS RESTRICTIVE');
    parts.push(`FOR ${policy.command}`);
    parts.push(`TO ${this.formatRoles(policy.roles)}`);
    if (policy.usingExpr !== null) parts.push(`USING (${policy.usingExpr})`);
    if (policy.checkExpr !== null) parts.push(`WITH CHECK (${policy.checkExpr})`);
    return parts.join(' ') + ';';
  }

  generateGrant(grant: GrantDescriptor): string {
    const option = grant.isGrantable ? ' WITH GRANT OPTION' : '';
    return `GRANT ${grant.privilege} ON ${this.grantObject(grant)} TO ${this.formatGrantee(grant.grantee)}${option};`;
  }

  generateRevoke(grant: GrantDescriptor): string {
    return `REVOKE ${grant.privilege} ON ${this.grantObject(grant)} FROM ${this.formatGrantee(grant.grantee)};`;
  }

  generateCreateExtension(extension: ExtensionDescriptor): string {
    return `CREATE EXTENSION IF NOT EXISTS ${quoteIdent(extension.name)} WITH SCHEMA ${quoteIdent(extension.schema)};`;
  }

  generateUpdateExtension(extension: ExtensionDescriptor): string {
    return `ALTER EXTENSION ${quoteIdent(extension.name)} UPDATE TO ${quoteLiteral(extension.version)};`;
  }

  generateScheduleJob(job: ScheduledJobDescriptor): string {
    return `SELECT cron.schedule(${quoteLiteral(job.jobName)}, ${quoteLiteral(job.schedule)}, ${quoteLiteral(job.command)});`;
  }

  generateSetJobActive(job: ScheduledJobDescriptor): string {
    return `SELECT cron.alter_job(jobid, active := ${job.active}) FROM cron.job WHERE jobname = ${quoteLiteral(job.jobName)};`;
  }

  generateTruncate(table: TableRef): string {
    return `TRUNCATE TABLE ${qualify(table.schema, table.name)} RESTART IDENTITY CASCADE;`;
  }

  private grantObject(grant: GrantDescriptor): string {
    switch (grant.objectType) {
      case 'TABLE':
        return `TABLE ${qualify(grant.schema, grant.object)}`;
      case 'SEQUENCE':
        return `SEQUENCE ${qualify(grant.schema, grant.object)}`;
      case 'SCHEMA':
        return `SCHEMA ${quoteIdent(grant.object)}`;
      case 'FUNCTION': {
        // object is "name(args)"; only the name needs quoting
        const paren = grant.object.indexOf('(');
        const name = paren === -1 ? grant.object : grant.object.slice(0, paren);
        const args = paren === -1 ? '()' : grant.object.slice(paren);
        return `FUNCTION ${qualify(grant.schema, name)}${args}`;
      }
    }
  }

  private sequenceOptions(sequence: SequenceDescriptor): string {
    return [
      `AS ${sequence.dataType}`,
      `INCREMENT BY ${sequence.increment}`,
      `MINVALUE ${sequence.minValue}`,
      `MAXVALUE ${sequence.maxValue}`,
      `START WITH ${sequence.start}`,
      sequence.cycle ? 'CYCLE' : 'NO CYCLE',
    ].join(' ');
  }

  private formatGrantee(grantee: string): string {
    return grantee === 'PUBLIC' ? 'PUBLIC' : quoteIdent(grantee);
  }

  private formatRoles(roles: string[]): string {
    if (roles.length === 0) return 'public';
    return roles.map(r => (POLICY_ROLE_KEYWORDS.has(r) ? r : quoteIdent(r))).join(', ');
  }

  private formatColumn(col: ColumnDescriptor): string {
    const parts = [quoteIdent(col.name), col.formattedType];

    if (col.identity) {
      parts.push(`GENERATED ${col.identity} AS IDENTITY`);
    }

    if (col.defaultExpr) {
      parts.push(`DEFAULT ${col.defaultExpr}`);
    }

    if (!col.isNullable) {
      parts.push('NOT NULL');
    }

    return parts.join(' ');
  }
}
