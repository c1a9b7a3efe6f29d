import {
  ColumnDescriptor,
  ConstraintDescriptor,
  ExtensionDescriptor,
  GrantDescriptor,
  PolicyDescriptor,
  ScheduledJobDescriptor,
  SequenceDescriptor,
  TableRef,
} from '../types/index.js';
import { quoteIdent } from '../utils/sql.js';

const PLAIN_IDENTIFIER = /^[a-z_][a-z0-9_$]*$/;

/** Joins name parts with dots; a part that is not a plain identifier is double-quoted. */
export function joinKey(...parts: string[]): string {
  return parts.map(part => (PLAIN_IDENTIFIER.test(part) ? part : quoteIdent(part))).join('.');
}

export const tableKey = (t: TableRef): string => joinKey(t.schema, t.name);
/** Key of the table a column, constraint or policy belongs to. */
export const ownerKey = (item: { schema: string; table: string }): string => joinKey(item.schema, item.table);
export const columnKey = (c: ColumnDescriptor): string => joinKey(c.schema, c.table, c.name);
export const constraintKey = (c: ConstraintDescriptor): string => joinKey(c.schema, c.table, c.name);
export const policyKey = (p: PolicyDescriptor): string => joinKey(p.schema, p.table, p.policyName);
export const grantKey = (g: GrantDescriptor): string =>
  `${g.objectType.toLowerCase()} ${joinKey(g.schema, g.object)}:${joinKey(g.grantee)}:${g.privilege}`;
export const sequenceKey = (s: SequenceDescriptor): string => joinKey(s.schema, s.name);
export const extensionKey = (e: ExtensionDescriptor): string => e.name;
export const jobKey = (j: ScheduledJobDescriptor): string => j.jobName;

export function sortByKey<T>(items: T[], key: (item: T) => string): T[] {
  return [...items].sort((a, b) => {
    const ka = key(a);
    const kb = key(b);
    return ka < kb ? -1 : ka > kb ? 1 : 0;
  });
}
