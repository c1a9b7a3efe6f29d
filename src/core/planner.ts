import { PostgresDDLGenerator } from '../engines/postgres/PostgresDDLGenerator.js';
import { SnapshotDiff } from '../types/comparison.js';
import {
  ColumnDescriptor,
  ConstraintDescriptor,
  PolicyDescriptor,
  Snapshot,
  SyncMode,
  TableDescriptor,
  TableRef,
} from '../types/index.js';
import { DeferredNotNull, MigrationPlan, Operation, OperationKind, Phase, PHASE_ORDER } from '../types/plan.js';
import { PlanGenerationFailure } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { columnKey, constraintKey, grantKey, ownerKey, policyKey, sequenceKey, sortByKey, tableKey } from './keys.js';

const POLICY_COMMANDS = new Set<string>(['SELECT', 'INSERT', 'UPDATE', 'DELETE', 'ALL']);
const CONSTRAINT_TYPES = new Set<string>(['PRIMARY KEY', 'FOREIGN KEY', 'UNIQUE', 'CHECK', 'EXCLUDE']);
const GRANT_OBJECT_TYPES = new Set<string>(['TABLE', 'SEQUENCE', 'FUNCTION', 'SCHEMA']);

export interface PlanContext {
  source: Snapshot;
  target: Snapshot;
  /** Tables whose rows are synced; replace mode truncates each of them. */
  dataTables?: readonly TableRef[];
}

type OperationExtras = Partial<Pick<Operation, 'destructive' | 'table' | 'group'>>;

function operation(
  kind: OperationKind,
  phase: Phase,
  targetObject: string,
  sqlStatement: string,
  extras: OperationExtras = {}
): Operation {
  return Object.freeze({ kind, phase, targetObject, sqlStatement, destructive: false, ...extras });
}

class PlanBuilder {
  readonly operations: Operation[] = [];
  readonly suppressed: Operation[] = [];
  readonly deferred: DeferredNotNull[] = [];

  constructor(private allowRemovals: boolean) {}

  emit(...ops: Operation[]): void {
    this.operations.push(...ops);
  }

  /** Removals of target-only objects only run under replace semantics. */
  removal(op: Operation): void {
    if (this.allowRemovals) {
      this.operations.push(op);
    } else {
      this.suppressed.push(op);
    }
  }
}

/**
 * Turns a snapshot diff into an ordered, immutable migration plan.
 * A plan depends only on the diff, the mode and the two snapshots.
 */
export class PlanGenerator {
  private ddl = new PostgresDDLGenerator();

  generate(diff: SnapshotDiff, mode: SyncMode, context: PlanContext): MigrationPlan {
    this.validate(diff, context);

    const builder = new PlanBuilder(mode.data === 'replace');

    if (mode.scope !== 'data-only') {
      this.planExtensions(builder, diff);
      this.planSequences(builder, diff);
      this.planTableCreates(builder, diff, context.source);
      this.planColumns(builder, diff);
      this.planSequenceOwners(builder, diff);
      this.planConstraints(builder, diff);
      this.planColumnDrops(builder, diff);
      this.planTableDrops(builder, diff);
      this.planSequenceDrops(builder, diff);
      this.planScheduledJobs(builder, diff);
      this.planPolicies(builder, diff, context);
      this.planGrants(builder, diff);
    }

    if (mode.scope !== 'schema-only' && mode.data === 'replace') {
      for (const table of context.dataTables ?? []) {
        builder.emit(
          operation('truncate_table', 'data', tableKey(table), this.ddl.generateTruncate(table), {
            destructive: true,
            table: tableKey(table),
          })
        );
      }
    }

    const operations = orderByPhase(builder.operations);
    const plan: MigrationPlan = Object.freeze({
      mode,
      operations: Object.freeze(operations),
      suppressed: Object.freeze([...builder.suppressed]),
      deferredNotNull: Object.freeze([...builder.deferred]),
      summary: Object.freeze(summarize(diff)),
      destructive: operations.some(op => op.destructive),
    });

    logger.info(
      { operations: operations.length, suppressed: builder.suppressed.length, destructive: plan.destructive },
      'Migration plan generated'
    );
    return plan;
  }

  private validate(diff: SnapshotDiff, context: PlanContext): void {
    const policies = [...diff.policies.added, ...diff.policies.changed.map(c => c.sourceValue), ...context.source.policies];
    for (const policy of policies) {
      if (!POLICY_COMMANDS.has(policy.command)) {
        throw new PlanGenerationFailure(`Unknown policy command "${policy.command}" on ${policyKey(policy)}`);
      }
    }

    const constraints = [...diff.constraints.added, ...diff.constraints.changed.map(c => c.sourceValue), ...context.source.constraints];
    for (const constraint of constraints) {
      if (!CONSTRAINT_TYPES.has(constraint.type)) {
        throw new PlanGenerationFailure(`Unknown constraint type "${constraint.type}" on ${constraintKey(constraint)}`);
      }
    }

    for (const grant of [...diff.grants.added, ...diff.grants.removed, ...diff.grants.changed.map(c => c.sourceValue)]) {
      if (!GRANT_OBJECT_TYPES.has(grant.objectType)) {
        throw new PlanGenerationFailure(`Unknown grant object type "${grant.objectType}" for ${grantKey(grant)}`);
      }
    }
  }

  private planExtensions(builder: PlanBuilder, diff: SnapshotDiff): void {
    for (const ext of diff.extensions.added) {
      builder.emit(operation('create_extension', 'pre-data', ext.name, this.ddl.generateCreateExtension(ext)));
    }
    for (const { sourceValue } of diff.extensions.changed) {
      builder.emit(operation('update_extension', 'pre-data', sourceValue.name, this.ddl.generateUpdateExtension(sourceValue)));
    }
  }

  /** New sequences exist before any table default refers to them. */
  private planSequences(builder: PlanBuilder, diff: SnapshotDiff): void {
    for (const sequence of diff.sequences.added) {
      builder.emit(operation('create_sequence', 'pre-data', sequenceKey(sequence), this.ddl.generateCreateSequence(sequence)));
    }
    for (const { sourceValue, differingFields } of diff.sequences.changed) {
      if (differingFields.some(f => f !== 'ownedBy')) {
        builder.emit(operation('alter_sequence', 'pre-data', sequenceKey(sourceValue), this.ddl.generateAlterSequence(sourceValue)));
      }
    }
  }

  /** Ownership needs the owning column, so it follows the column changes. */
  private planSequenceOwners(builder: PlanBuilder, diff: SnapshotDiff): void {
    const owned = [
      ...diff.sequences.added.filter(s => s.ownedBy !== null),
      ...diff.sequences.changed.filter(c => c.differingFields.includes('ownedBy')).map(c => c.sourceValue),
    ];
    for (const sequence of owned) {
      builder.emit(operation('sequence_owned_by', 'pre-data', sequenceKey(sequence), this.ddl.generateSequenceOwner(sequence)));
    }
  }

  private planSequenceDrops(builder: PlanBuilder, diff: SnapshotDiff): void {
    for (const sequence of diff.sequences.removed) {
      builder.removal(
        operation('drop_sequence', 'pre-data', sequenceKey(sequence), this.ddl.generateDropSequence(sequence), { destructive: true })
      );
    }
  }

  private planTableCreates(builder: PlanBuilder, diff: SnapshotDiff, source: Snapshot): void {
    for (const table of diff.tables.added) {
      const key = tableKey(table);
      const columns = source.columns.filter(c => c.schema === table.schema && c.table === table.name);
      if (columns.length === 0) {
        throw new PlanGenerationFailure(`Source snapshot has no columns for new table ${key}`);
      }

      builder.emit(operation('create_table', 'pre-data', key, this.ddl.generateTableCreate(table, columns), { table: key }));

      for (const constraint of source.constraints.filter(c => c.schema === table.schema && c.table === table.name)) {
        builder.emit(this.addConstraint(constraint));
      }
    }
  }

  private planColumns(builder: PlanBuilder, diff: SnapshotDiff): void {
    for (const column of diff.columns.added) {
      const table = ownerKey(column);
      const target = columnKey(column);
      // identity columns fill existing rows themselves
      const defer = !column.isNullable && column.defaultExpr === null && column.identity === null;

      builder.emit(
        operation('add_column', 'pre-data', target, this.ddl.generateAddColumn(column, { deferNotNull: defer }), { table })
      );

      if (defer) {
        builder.deferred.push(Object.freeze({ schema: column.schema, table: column.table, column: column.name }));
        builder.emit(
          operation(
            'deferred_not_null',
            'post-data',
            target,
            this.ddl.generateSetNotNull({ schema: column.schema, name: column.table }, column.name),
            { table }
          )
        );
      }
    }

    for (const { sourceValue, targetValue, differingFields } of diff.columns.changed) {
      builder.emit(...this.alterColumn(sourceValue, targetValue, differingFields));
    }
  }

  private alterColumn(column: ColumnDescriptor, current: ColumnDescriptor, differingFields: string[]): Operation[] {
    const table = ownerKey(column);
    const target = columnKey(column);
    const ops: Operation[] = [];

    if (differingFields.includes('formattedType')) {
      ops.push(operation('alter_column_type', 'pre-data', target, this.ddl.generateAlterColumnType(column), { table }));
    }
    if (differingFields.includes('defaultExpr')) {
      const kind = column.defaultExpr === null ? 'drop_default' : 'set_default';
      ops.push(operation(kind, 'pre-data', target, this.ddl.generateAlterColumnDefault(column), { table }));
    }
    if (differingFields.includes('isNullable')) {
      const kind = column.isNullable ? 'drop_not_null' : 'set_not_null';
      ops.push(operation(kind, 'pre-data', target, this.ddl.generateAlterColumnNullability(column), { table }));
    }
    if (differingFields.includes('identity')) {
      ops.push(operation('alter_identity', 'pre-data', target, this.ddl.generateAlterIdentity(column, current.identity), { table }));
    }
    return ops;
  }

  private planConstraints(builder: PlanBuilder, diff: SnapshotDiff): void {
    for (const { sourceValue, targetValue } of diff.constraints.changed) {
      builder.emit(this.dropConstraint(targetValue, false));
      builder.emit(this.addConstraint(sourceValue));
    }
    for (const constraint of diff.constraints.added) {
      builder.emit(this.addConstraint(constraint));
    }
    for (const constraint of diff.constraints.removed) {
      builder.removal(this.dropConstraint(constraint, true));
    }
  }

  private addConstraint(constraint: ConstraintDescriptor): Operation {
    // foreign keys wait until referenced rows are loaded
    const phase: Phase = constraint.type === 'FOREIGN KEY' ? 'post-data' : 'pre-data';
    return operation('add_constraint', phase, constraintKey(constraint), this.ddl.generateAddConstraint(constraint), {
      table: ownerKey(constraint),
    });
  }

  private dropConstraint(constraint: ConstraintDescriptor, destructive: boolean): Operation {
    return operation('drop_constraint', 'pre-data', constraintKey(constraint), this.ddl.generateDropConstraint(constraint), {
      table: ownerKey(constraint),
      destructive,
    });
  }

  private planColumnDrops(builder: PlanBuilder, diff: SnapshotDiff): void {
    for (const column of diff.columns.removed) {
      builder.removal(
        operation('drop_column', 'pre-data', columnKey(column), this.ddl.generateDropColumn(column), {
          table: ownerKey(column),
          destructive: true,
        })
      );
    }
  }

  private planTableDrops(builder: PlanBuilder, diff: SnapshotDiff): void {
    for (const table of diff.tables.removed) {
      const key = tableKey(table);
      builder.removal(operation('drop_table', 'pre-data', key, this.ddl.generateDropTable(table), { table: key, destructive: true }));
    }
  }

  /**
   * `cron.schedule` upserts a job by name but leaves `active` alone, so an
   * activity change is applied separately.
   */
  private planScheduledJobs(builder: PlanBuilder, diff: SnapshotDiff): void {
    for (const job of diff.scheduledJobs.added) {
      builder.emit(operation('schedule_job', 'post-data', job.jobName, this.ddl.generateScheduleJob(job)));
      if (!job.active) builder.emit(operation('alter_job', 'post-data', job.jobName, this.ddl.generateSetJobActive(job)));
    }
    for (const { sourceValue: job, differingFields } of diff.scheduledJobs.changed) {
      if (differingFields.includes('schedule') || differingFields.includes('command')) {
        builder.emit(operation('schedule_job', 'post-data', job.jobName, this.ddl.generateScheduleJob(job)));
      }
      if (differingFields.includes('active')) {
        builder.emit(operation('alter_job', 'post-data', job.jobName, this.ddl.generateSetJobActive(job)));
      }
    }
  }

  /**
   * Every table with a policy or RLS difference gets its policy set rebuilt
   * as one block: enable RLS, drop every target policy, create every source
   * policy.
   */
  private planPolicies(builder: PlanBuilder, diff: SnapshotDiff, context: PlanContext): void {
    const touched = new Set<string>();
    const changedPolicies = diff.policies.changed.map(c => c.sourceValue);
    for (const policy of [...diff.policies.added, ...diff.policies.removed, ...changedPolicies]) {
      touched.add(ownerKey(policy));
    }
    for (const { key } of diff.rls.changed) touched.add(key);
    for (const table of diff.tables.added) {
      if (table.rlsEnabled || table.rlsForced) touched.add(tableKey(table));
    }

    const sourceTables = new Map(context.source.tables.map(t => [tableKey(t), t]));
    const targetTables = new Map(context.target.tables.map(t => [tableKey(t), t]));

    for (const key of [...touched].sort()) {
      const sourceTable = sourceTables.get(key);
      if (!sourceTable) {
        logger.debug({ table: key }, 'Skipping policies of a table absent from source');
        continue;
      }
      const onTable = (p: PolicyDescriptor) => ownerKey(p) === key;
      const sourcePolicies = sortByKey(context.source.policies.filter(onTable), policyKey);
      const targetPolicies = sortByKey(context.target.policies.filter(onTable), policyKey);
      builder.emit(...this.policyBlock(sourceTable, targetTables.get(key), sourcePolicies, targetPolicies));
    }
  }

  private policyBlock(
    source: TableDescriptor,
    target: TableDescriptor | undefined,
    sourcePolicies: PolicyDescriptor[],
    targetPolicies: PolicyDescriptor[]
  ): Operation[] {
    const table = tableKey(source);
    const extras: OperationExtras = { table, group: `policies:${table}` };
    const ops: Operation[] = [];
    const rlsOn = source.rlsEnabled || sourcePolicies.length > 0;

    if (rlsOn) {
      ops.push(operation('enable_rls', 'security', table, this.ddl.generateRowSecurity(source, 'ENABLE'), extras));
    }
    if (source.rlsForced) {
      ops.push(operation('force_rls', 'security', table, this.ddl.generateRowSecurity(source, 'FORCE'), extras));
    } else if (target?.rlsForced) {
      ops.push(operation('no_force_rls', 'security', table, this.ddl.generateRowSecurity(source, 'NO FORCE'), extras));
    }

    const sourceNames = new Set(sourcePolicies.map(p => p.policyName));
    for (const policy of targetPolicies) {
      ops.push(
        operation('drop_policy', 'security', policyKey(policy), this.ddl.generateDropPolicy(policy), {
          ...extras,
          destructive: !sourceNames.has(policy.policyName),
        })
      );
    }

    if (!rlsOn && target?.rlsEnabled) {
      ops.push(operation('disable_rls', 'security', table, this.ddl.generateRowSecurity(source, 'DISABLE'), extras));
    }

    for (const policy of sourcePolicies) {
      ops.push(operation('create_policy', 'security', policyKey(policy), this.ddl.generateCreatePolicy(policy), extras));
    }
    return ops;
  }

  private planGrants(builder: PlanBuilder, diff: SnapshotDiff): void {
    const grants = [...diff.grants.changed.map(c => c.sourceValue), ...diff.grants.added];
    for (const grant of grants) {
      const target = grantKey(grant);
      builder.emit(operation('revoke', 'security', target, this.ddl.generateRevoke(grant)));
      builder.emit(operation('grant', 'security', target, this.ddl.generateGrant(grant)));
    }
    for (const grant of diff.grants.removed) {
      const target = grantKey(grant);
      builder.removal(operation('revoke', 'security', target, this.ddl.generateRevoke(grant), { destructive: true }));
    }
  }
}

function orderByPhase(operations: Operation[]): Operation[] {
  return PHASE_ORDER.flatMap(phase => operations.filter(op => op.phase === phase));
}

function summarize(diff: SnapshotDiff): { added: number; removed: number; changed: number } {
  const parts = [
    diff.tables,
    diff.sequences,
    diff.columns,
    diff.constraints,
    diff.policies,
    diff.grants,
    diff.rls,
    diff.extensions,
    diff.scheduledJobs,
  ];
  return {
    added: parts.reduce((n, d) => n + d.added.length, 0),
    removed: parts.reduce((n, d) => n + d.removed.length, 0),
    changed: parts.reduce((n, d) => n + d.changed.length, 0),
  };
}

/** Splits operations into execution units; consecutive operations sharing a group form one unit. */
export function executionUnits(operations: readonly Operation[]): Operation[][] {
  const units: Operation[][] = [];
  for (const op of operations) {
    const last = units[units.length - 1];
    if (op.group && last && last[0].group === op.group) {
      last.push(op);
    } else {
      units.push([op]);
    }
  }
  return units;
}

export function unitSql(unit: readonly Operation[]): string {
  const body = unit.map(op => op.sqlStatement).join('\n');
  return unit[0]?.group ? `BEGIN;\n${body}\nCOMMIT;` : body;
}

/** Renders a plan as one script, phase by phase. */
export function toSql(plan: MigrationPlan): string {
  const sections: string[] = [];
  for (const phase of PHASE_ORDER) {
    const ops = plan.operations.filter(op => op.phase === phase);
    if (ops.length === 0) continue;
    sections.push(`-- Phase: ${phase}\n${executionUnits(ops).map(unitSql).join('\n')}`);
  }
  if (plan.suppressed.length > 0) {
    sections.push(
      `-- Suppressed (requires replace mode):\n${plan.suppressed.map(op => `-- ${op.sqlStatement}`).join('\n')}`
    );
  }
  return sections.join('\n\n') + '\n';
}
