import path from 'path';
import { isSchemaExcluded, USER_TABLES } from '../config/reconcile-config.js';
import { ManagementApiClient } from '../db/management-api.js';
import { ConnectionResolver } from '../db/resolver.js';
import { IPgTools, ISchemaInspector, IStreamingConnection } from '../engines/interfaces.js';
import { PgTools } from '../engines/postgres/PgTools.js';
import { PostgresInspector } from '../engines/postgres/PostgresInspector.js';
import { SnapshotDiff, DriftReport } from '../types/comparison.js';
import { EnvironmentCredentials, ReconciliationConfig, Snapshot, TableRef } from '../types/index.js';
import { ExecutionReport, MigrationPlan, SyncReport } from '../types/plan.js';
import { errorMessage, ReconcileError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { confirm as promptConfirm } from '../utils/prompt.js';
import { parseTableName } from '../utils/sql.js';
import { defaultMigrationDir, MigrationKind, PlanArtifacts, PlanWriter } from '../writer/writer.js';
import { SchemaComparator } from './comparator.js';
import { DataSyncEngine, SyncSide } from './data-sync.js';
import { ExecutionEngine } from './executor.js';
import { ownerKey, tableKey } from './keys.js';
import { PlanGenerator } from './planner.js';
import { Verifier } from './verifier.js';

export interface ReconcilerDeps {
  resolver?: ConnectionResolver;
  tools?: IPgTools;
  inspector?: ISchemaInspector;
  confirm?: (question: string) => Promise<boolean>;
}

export interface PlanOutcome {
  diff: SnapshotDiff;
  plan: MigrationPlan;
  artifacts: PlanArtifacts;
  dataTables: TableRef[];
}

export interface ReconcileResult {
  plan: MigrationPlan;
  artifacts: PlanArtifacts;
  execution: ExecutionReport;
  sync?: SyncReport;
  pendingBackfill: string[];
  drift?: DriftReport;
  /** Custom-format dump of the target taken before anything was applied. */
  backupPath?: string;
}

interface Sides {
  source: SyncSide;
  target: SyncSide;
}

/**
 * Drives one reconciliation: introspect both sides, diff, plan, apply
 * phase by phase, sync rows and verify. Only the target is written to.
 */
export class Reconciler {
  private resolver: ConnectionResolver;
  private tools: IPgTools;
  private inspector: ISchemaInspector;
  private executor: ExecutionEngine;
  private dataSync: DataSyncEngine;
  private askConfirmation: (question: string) => Promise<boolean>;

  constructor(
    private source: EnvironmentCredentials,
    private target: EnvironmentCredentials,
    private config: ReconciliationConfig,
    deps: ReconcilerDeps = {}
  ) {
    this.resolver =
      deps.resolver ??
      new ConnectionResolver({ connectTimeoutMs: config.connectTimeoutMs, managementApi: new ManagementApiClient() });
    this.tools = deps.tools ?? new PgTools();
    this.inspector =
      deps.inspector ?? new PostgresInspector({ excludedSchemas: config.excludedSchemas, managedRoles: config.managedRoles });
    this.executor = new ExecutionEngine(this.resolver, this.tools);
    this.dataSync = new DataSyncEngine(this.resolver, this.tools, this.executor, this.inspector);
    this.askConfirmation = deps.confirm ?? promptConfirm;
  }

  /** Computes and writes the plan without touching the target. */
  async plan(kind: MigrationKind = 'plan'): Promise<PlanOutcome> {
    return this.withSides(sides => this.buildPlan(sides, kind));
  }

  async run(): Promise<ReconcileResult> {
    return this.withSides(async sides => {
      const { plan, artifacts, dataTables } = await this.buildPlan(sides, 'migration');

      if (plan.destructive && !this.config.dryRun && !this.config.autoConfirm) {
        const destructive = plan.operations.filter(op => op.destructive).length;
        const confirmed = await this.askConfirmation(
          `The plan for ${this.target.name} contains ${destructive} destructive operation(s). Apply it?`
        );
        if (!confirmed) {
          throw new ReconcileError('execution', 'Destructive plan was not confirmed', { plan: artifacts.sqlPath });
        }
      }

      if (this.config.dryRun) {
        const execution = await this.executor.apply(plan, this.target, { dryRun: true });
        logger.info(`Dry run complete. Plan: ${artifacts.sqlPath}`);
        return { plan, artifacts, execution, pendingBackfill: [] };
      }

      const backupPath = this.config.backup ? await this.backupTarget(path.dirname(artifacts.sqlPath)) : undefined;
      const { execution, sync, pendingBackfill } = await this.apply(plan, sides, dataTables);

      const drift = await new Verifier(this.inspector).verify(sides.source.db, sides.target.db, {
        sourceEnv: this.source.name,
        targetEnv: this.target.name,
        excludedSchemas: this.config.excludedSchemas,
        rowCountTables: sync ? dataTables : undefined,
      });

      return { plan, artifacts, execution, sync, pendingBackfill, drift, backupPath };
    });
  }

  async verify(): Promise<DriftReport> {
    return this.withSides(async sides => {
      const tables = this.config.dataTables ? this.parseTables(this.config.dataTables) : undefined;
      return new Verifier(this.inspector).verify(sides.source.db, sides.target.db, {
        sourceEnv: this.source.name,
        targetEnv: this.target.name,
        excludedSchemas: this.config.excludedSchemas,
        rowCountTables: tables,
      });
    });
  }

  /** Dumps the whole target next to the plan artifacts; a failed dump stops the run. */
  private async backupTarget(dir: string): Promise<string> {
    const file = path.join(dir, 'target_backup.dump');
    logger.info({ file }, `Backing up ${this.target.name}`);
    try {
      return await this.resolver.withEndpoints<string>(this.target, 'Backing up target', async target => {
        const result = await this.tools.backup(target, file);
        return result.exitCode === 0 ? { ok: true, value: file } : { ok: false, error: result.output };
      });
    } catch (error) {
      throw new ReconcileError('execution', `Backup of ${this.target.name} failed: ${errorMessage(error)}`, { file });
    }
  }

  private async apply(
    plan: MigrationPlan,
    sides: Sides,
    dataTables: TableRef[]
  ): Promise<{ execution: ExecutionReport; sync?: SyncReport; pendingBackfill: string[] }> {
    const { mode } = this.config;
    const reports: ExecutionReport[] = [];
    const pendingBackfill: string[] = [];

    // incremental schema-only runs keep the rows of tables they alter
    const preserved = new Map<string, TableRef>();
    if (mode.scope === 'schema-only' && mode.data === 'incremental') {
      const existing = new Map((await this.inspector.listTables(sides.target.db)).map(t => [tableKey(t), t]));
      for (const op of plan.operations) {
        const table = op.table === undefined ? undefined : existing.get(op.table);
        if (op.phase === 'pre-data' && table && op.kind !== 'create_table') preserved.set(tableKey(table), table);
      }
    }

    reports.push(
      await this.executor.apply(plan, this.target, {
        phases: ['pre-data'],
        filter: op => !(op.table && preserved.has(op.table)),
      })
    );

    for (const [key, table] of [...preserved].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      const ops = plan.operations.filter(op => op.phase === 'pre-data' && op.table === key);
      const started = Date.now();
      const { results, pending } = await this.dataSync.preserveAndApply(sides.target, table, ops, plan.deferredNotNull);
      pendingBackfill.push(...pending);
      reports.push({
        success: true,
        dryRun: false,
        applied: ops.length,
        tolerated: results.filter(r => r.classification === 'tolerable').length,
        results,
        duration: Date.now() - started,
      });
    }

    // truncates of the data phase run inside each table's load script
    let sync: SyncReport | undefined;
    if (mode.scope !== 'schema-only') {
      sync = await this.dataSync.sync(sides.source, sides.target, dataTables, mode);
    }

    reports.push(
      await this.executor.apply(plan, this.target, {
        phases: ['post-data'],
        filter: op => op.kind !== 'deferred_not_null',
      })
    );
    const deferred = plan.deferredNotNull.filter(d => !preserved.has(ownerKey(d)));
    pendingBackfill.push(...(await this.dataSync.enforceNotNull(sides.target, deferred)));

    reports.push(await this.executor.apply(plan, this.target, { phases: ['security'] }));

    if (sync) sync.pendingBackfill.push(...pendingBackfill);
    return { execution: mergeReports(reports), sync, pendingBackfill };
  }

  private async buildPlan(sides: Sides, kind: MigrationKind): Promise<PlanOutcome> {
    const sourceSnapshot = await this.inspector.introspect(sides.source.db);
    const targetSnapshot = await this.inspector.introspect(sides.target.db);
    const diff = new SchemaComparator().diff(sourceSnapshot, targetSnapshot);

    const dataTables = this.config.mode.scope === 'schema-only' ? [] : this.resolveDataTables(sourceSnapshot);
    const plan = new PlanGenerator().generate(diff, this.config.mode, {
      source: sourceSnapshot,
      target: targetSnapshot,
      dataTables,
    });

    const dir = this.config.migrationDir ?? defaultMigrationDir(kind, this.source.name, this.target.name);
    const artifacts = await new PlanWriter(dir).write(plan, this.source.name, this.target.name);
    return { diff, plan, artifacts, dataTables };
  }

  private resolveDataTables(snapshot: Snapshot): TableRef[] {
    let tables: TableRef[];
    if (this.config.dataTables) {
      tables = this.parseTables(this.config.dataTables).filter(t => {
        const excluded = isSchemaExcluded(t.schema, this.config.excludedSchemas);
        if (excluded) logger.warn(`Skipping ${tableKey(t)}: schema ${t.schema} is excluded`);
        return !excluded;
      });
    } else {
      tables = snapshot.tables.map(t => ({ schema: t.schema, name: t.name }));
    }

    if (this.config.includeUsers) {
      const keys = new Set(tables.map(tableKey));
      tables.push(...this.parseTables(USER_TABLES).filter(t => !keys.has(tableKey(t))));
    }
    return tables;
  }

  private parseTables(names: readonly string[]): TableRef[] {
    return names.map(parseTableName);
  }

  private async withSides<T>(work: (sides: Sides) => Promise<T>): Promise<T> {
    const sourceDb = await this.resolver.resolve(this.source, 'introspection');
    let targetDb: IStreamingConnection | undefined;
    try {
      targetDb = await this.resolver.resolve(this.target, 'introspection');
      return await work({
        source: { creds: this.source, db: sourceDb },
        target: { creds: this.target, db: targetDb },
      });
    } catch (error) {
      logger.error(error, 'Reconciliation failed');
      throw error;
    } finally {
      await sourceDb.close();
      await targetDb?.close();
    }
  }
}

function mergeReports(reports: ExecutionReport[]): ExecutionReport {
  return {
    success: reports.every(r => r.success),
    dryRun: false,
    applied: reports.reduce((n, r) => n + r.applied, 0),
    tolerated: reports.reduce((n, r) => n + r.tolerated, 0),
    results: reports.flatMap(r => r.results),
    duration: reports.reduce((n, r) => n + r.duration, 0),
  };
}
