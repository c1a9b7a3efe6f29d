import {
  ColumnDescriptor,
  ConstraintDescriptor,
  ExtensionDescriptor,
  GrantDescriptor,
  PolicyDescriptor,
  ScheduledJobDescriptor,
  SequenceDescriptor,
  TableDescriptor,
} from './index.js';

export interface ChangedEntry<T> {
  key: string;
  sourceValue: T;
  targetValue: T;
  differingFields: string[];
}

export interface DiffResult<T> {
  added: T[];
  removed: T[];
  changed: ChangedEntry<T>[];
}

export interface SnapshotDiff {
  tables: DiffResult<TableDescriptor>;
  sequences: DiffResult<SequenceDescriptor>;
  columns: DiffResult<ColumnDescriptor>;
  constraints: DiffResult<ConstraintDescriptor>;
  policies: DiffResult<PolicyDescriptor>;
  grants: DiffResult<GrantDescriptor>;
  rls: DiffResult<TableDescriptor>;
  extensions: DiffResult<ExtensionDescriptor>;
  scheduledJobs: DiffResult<ScheduledJobDescriptor>;
}

export type DiffCategory = keyof SnapshotDiff;

export interface DriftItem {
  category: DiffCategory;
  change: 'missing_in_target' | 'extra_in_target' | 'mismatch';
  name: string;
  details: string;
}

export interface DriftReport {
  sourceEnv: string;
  targetEnv: string;
  clean: boolean;
  counts: Record<DiffCategory, number>;
  items: DriftItem[];
  expectedExclusions: string[];
  rowCounts: RowCountComparison[];
}

export interface RowCountComparison {
  table: string;
  source: number;
  target: number;
}
