import { IDbConnection, ISchemaInspector } from '../engines/interfaces.js';
import { DiffCategory, DiffResult, DriftItem, DriftReport, RowCountComparison, SnapshotDiff } from '../types/comparison.js';
import {
  ColumnDescriptor,
  ConstraintDescriptor,
  ExtensionDescriptor,
  GrantDescriptor,
  PolicyDescriptor,
  ScheduledJobDescriptor,
  SequenceDescriptor,
  TableDescriptor,
  TableRef,
} from '../types/index.js';
import { logger } from '../utils/logger.js';
import { countDiff, SchemaComparator } from './comparator.js';
import {
  columnKey,
  constraintKey,
  extensionKey,
  grantKey,
  jobKey,
  policyKey,
  sequenceKey,
  tableKey,
} from './keys.js';

export interface VerifyOptions {
  sourceEnv: string;
  targetEnv: string;
  /** Schemas left out of the comparison on purpose. */
  excludedSchemas: readonly string[];
  /** Tables whose row counts are compared. */
  rowCountTables?: readonly TableRef[];
}

type Describe<T> = (item: T) => string;

function driftItems<T>(
  category: DiffCategory,
  diff: DiffResult<T>,
  name: (item: T) => string,
  describe: Describe<T> = () => ''
): DriftItem[] {
  return [
    ...diff.added.map(item => ({ category, change: 'missing_in_target' as const, name: name(item), details: describe(item) })),
    ...diff.removed.map(item => ({ category, change: 'extra_in_target' as const, name: name(item), details: describe(item) })),
    ...diff.changed.map(entry => ({
      category,
      change: 'mismatch' as const,
      name: entry.key,
      details: entry.differingFields
        .map(field => `${field}: ${show(entry.sourceValue, field)} -> ${show(entry.targetValue, field)}`)
        .join('; '),
    })),
  ];
}

function show(value: unknown, field: string): string {
  if (typeof value !== 'object' || value === null || !(field in value)) return '-';
  const v: unknown = Reflect.get(value, field);
  if (v === null || v === undefined) return 'null';
  if (Array.isArray(v)) return `{${v.join(',')}}`;
  return typeof v === 'object' ? JSON.stringify(v) : String(v);
}

export function describeDrift(diff: SnapshotDiff): DriftItem[] {
  return [
    ...driftItems<TableDescriptor>('tables', diff.tables, tableKey),
    ...driftItems<SequenceDescriptor>('sequences', diff.sequences, sequenceKey, s => s.dataType),
    ...driftItems<ColumnDescriptor>('columns', diff.columns, columnKey, c => c.formattedType),
    ...driftItems<ConstraintDescriptor>('constraints', diff.constraints, constraintKey, c => c.definition),
    ...driftItems<PolicyDescriptor>('policies', diff.policies, policyKey, p => `${p.command} TO ${p.roles.join(', ')}`),
    ...driftItems<GrantDescriptor>('grants', diff.grants, grantKey),
    ...driftItems<TableDescriptor>('rls', diff.rls, tableKey),
    ...driftItems<ExtensionDescriptor>('extensions', diff.extensions, extensionKey, e => e.version),
    ...driftItems<ScheduledJobDescriptor>('scheduledJobs', diff.scheduledJobs, jobKey, j => j.schedule),
  ];
}

/** Re-introspects both sides and reports every residual difference by name. */
export class Verifier {
  private comparator = new SchemaComparator();

  constructor(private inspector: ISchemaInspector) {}

  async verify(source: IDbConnection, target: IDbConnection, options: VerifyOptions): Promise<DriftReport> {
    const sourceSnapshot = await this.inspector.introspect(source);
    const targetSnapshot = await this.inspector.introspect(target);
    const diff = this.comparator.diff(sourceSnapshot, targetSnapshot);

    const rowCounts: RowCountComparison[] = [];
    for (const table of options.rowCountTables ?? []) {
      rowCounts.push({
        table: tableKey(table),
        source: await this.inspector.countRows(source, table),
        target: await this.inspector.countRows(target, table),
      });
    }

    const items = describeDrift(diff);
    const report: DriftReport = {
      sourceEnv: options.sourceEnv,
      targetEnv: options.targetEnv,
      clean: items.length === 0,
      counts: countDiff(diff),
      items,
      expectedExclusions: [...options.excludedSchemas],
      rowCounts,
    };

    if (report.clean) {
      logger.info(`No drift between ${options.sourceEnv} and ${options.targetEnv}`);
    } else {
      logger.warn({ counts: report.counts }, `${items.length} differences remain between ${options.sourceEnv} and ${options.targetEnv}`);
    }
    return report;
  }
}
