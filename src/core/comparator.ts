import { ChangedEntry, DiffCategory, DiffResult, SnapshotDiff } from '../types/comparison.js';
import { Snapshot } from '../types/index.js';
import {
  columnKey,
  constraintKey,
  extensionKey,
  grantKey,
  jobKey,
  ownerKey,
  policyKey,
  sequenceKey,
  tableKey,
} from './keys.js';

function normalize(value: unknown): string | number | boolean | null {
  if (value === undefined || value === null) return null;
  if (Array.isArray(value)) return value.map(String).sort().join('\u0000');
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  return JSON.stringify(value);
}

/**
 * Keyed diff of two descriptor lists. Arrays are compared as sets and
 * expression text is compared literally.
 */
export function diffDescriptors<T>(
  source: readonly T[],
  target: readonly T[],
  key: (item: T) => string,
  fields: readonly (keyof T & string)[]
): DiffResult<T> {
  const sourceMap = new Map(source.map(item => [key(item), item]));
  const targetMap = new Map(target.map(item => [key(item), item]));

  const added: T[] = [];
  const changed: ChangedEntry<T>[] = [];
  for (const [k, sourceValue] of sourceMap) {
    const targetValue = targetMap.get(k);
    if (!targetValue) {
      added.push(sourceValue);
      continue;
    }
    const differingFields = fields.filter(f => normalize(sourceValue[f]) !== normalize(targetValue[f]));
    if (differingFields.length > 0) {
      changed.push({ key: k, sourceValue, targetValue, differingFields });
    }
  }

  const removed = target.filter(item => !sourceMap.has(key(item)));
  return { added, removed, changed };
}

export class SchemaComparator {
  diff(source: Snapshot, target: Snapshot): SnapshotDiff {
    const tables = diffDescriptors(source.tables, target.tables, tableKey, []);

    // columns and constraints of whole-table additions/removals travel with the table
    const wholeTables = new Set([...tables.added, ...tables.removed].map(tableKey));
    const onSharedTable = (item: { schema: string; table: string }) => !wholeTables.has(ownerKey(item));

    const rlsSource = source.tables.filter(t => !wholeTables.has(tableKey(t)));
    const rlsTarget = target.tables.filter(t => !wholeTables.has(tableKey(t)));
    const rls = diffDescriptors(rlsSource, rlsTarget, tableKey, ['rlsEnabled', 'rlsForced']);

    return {
      tables,
      sequences: diffDescriptors(source.sequences, target.sequences, sequenceKey, [
        'dataType',
        'increment',
        'minValue',
        'maxValue',
        'start',
        'cycle',
        'ownedBy',
      ]),
      columns: diffDescriptors(
        source.columns.filter(onSharedTable),
        target.columns.filter(onSharedTable),
        columnKey,
        ['formattedType', 'isNullable', 'defaultExpr', 'identity']
      ),
      constraints: diffDescriptors(
        source.constraints.filter(onSharedTable),
        target.constraints.filter(onSharedTable),
        constraintKey,
        ['type', 'definition']
      ),
      policies: diffDescriptors(source.policies, target.policies, policyKey, [
        'command',
        'roles',
        'usingExpr',
        'checkExpr',
        'permissive',
      ]),
      grants: diffDescriptors(source.grants, target.grants, grantKey, ['isGrantable']),
      rls: { added: [], removed: [], changed: rls.changed },
      extensions: diffDescriptors(source.extensions, target.extensions, extensionKey, ['version']),
      scheduledJobs: diffDescriptors(source.scheduledJobs, target.scheduledJobs, jobKey, ['schedule', 'command', 'active']),
    };
  }
}

export const DIFF_CATEGORIES: readonly DiffCategory[] = [
  'tables',
  'sequences',
  'columns',
  'constraints',
  'policies',
  'grants',
  'rls',
  'extensions',
  'scheduledJobs',
];

export function countDiff(diff: SnapshotDiff): Record<DiffCategory, number> {
  const size = (d: DiffResult<unknown>) => d.added.length + d.removed.length + d.changed.length;
  return {
    tables: size(diff.tables),
    sequences: size(diff.sequences),
    columns: size(diff.columns),
    constraints: size(diff.constraints),
    policies: size(diff.policies),
    grants: size(diff.grants),
    rls: size(diff.rls),
    extensions: size(diff.extensions),
    scheduledJobs: size(diff.scheduledJobs),
  };
}

export function isEmptyDiff(diff: SnapshotDiff): boolean {
  return Object.values(countDiff(diff)).every(n => n === 0);
}
