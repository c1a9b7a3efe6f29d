import { SyncMode } from './index.js';

export type OperationKind =
  | 'create_table'
  | 'drop_table'
  | 'create_sequence'
  | 'alter_sequence'
  | 'sequence_owned_by'
  | 'drop_sequence'
  | 'add_column'
  | 'alter_column_type'
  | 'set_not_null'
  | 'drop_not_null'
  | 'set_default'
  | 'drop_default'
  | 'alter_identity'
  | 'drop_column'
  | 'add_constraint'
  | 'drop_constraint'
  | 'enable_rls'
  | 'force_rls'
  | 'no_force_rls'
  | 'disable_rls'
  | 'drop_policy'
  | 'create_policy'
  | 'revoke'
  | 'grant'
  | 'create_extension'
  | 'update_extension'
  | 'schedule_job'
  | 'alter_job'
  | 'truncate_table'
  | 'deferred_not_null';

/**
 * Execution phase. Structural changes run before data, constraints that need
 * the data in place run after it, and the security phase runs last.
 */
export type Phase = 'pre-data' | 'data' | 'post-data' | 'security';

export const PHASE_ORDER: readonly Phase[] = ['pre-data', 'data', 'post-data', 'security'];

export interface Operation {
  readonly kind: OperationKind;
  readonly phase: Phase;
  readonly targetObject: string;
  readonly sqlStatement: string;
  readonly destructive: boolean;
  /** Key of the table the statement alters (see `tableKey`), when it alters one. */
  readonly table?: string;
  /** Operations sharing a group id are applied together inside one transaction. */
  readonly group?: string;
}

export interface DeferredNotNull {
  readonly schema: string;
  readonly table: string;
  readonly column: string;
}

export interface PlanSummary {
  added: number;
  removed: number;
  changed: number;
}

export interface MigrationPlan {
  readonly mode: SyncMode;
  readonly operations: readonly Operation[];
  readonly suppressed: readonly Operation[];
  readonly deferredNotNull: readonly DeferredNotNull[];
  readonly summary: Readonly<PlanSummary>;
  readonly destructive: boolean;
}

export type Classification = 'ok' | 'fatal' | 'tolerable' | 'unexpected';

export interface ClassifiedOutput {
  classification: Classification;
  /** Lines that decided the classification (the first fatal/unexpected line, or every tolerated line). */
  matched: string[];
}

export interface OperationResult {
  target: string;
  classification: Classification;
  endpoint: string;
  output?: string;
}

export interface ExecutionReport {
  success: boolean;
  dryRun: boolean;
  applied: number;
  tolerated: number;
  results: OperationResult[];
  duration: number;
}

export interface TableSyncResult {
  table: string;
  extraction: 'dump' | 'cursor' | 'none';
  statements: number;
  sourceRows: number;
  targetRowsBefore: number;
  targetRowsAfter: number;
}

export interface SyncReport {
  mode: SyncMode;
  tables: TableSyncResult[];
  /** Columns left nullable because restored rows still hold NULLs. */
  pendingBackfill: string[];
}
