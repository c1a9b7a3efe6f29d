import { ConnectionResolver } from '../db/resolver.js';
import { IDataExtractor, IPgTools, ISchemaInspector, IStreamingConnection } from '../engines/interfaces.js';
import { PostgresDDLGenerator } from '../engines/postgres/PostgresDDLGenerator.js';
import { PostgresExtractor } from '../engines/postgres/PostgresExtractor.js';
import { DataMode, EnvironmentCredentials, SyncMode, TableRef } from '../types/index.js';
import { DeferredNotNull, Operation, OperationResult, SyncReport, TableSyncResult } from '../types/plan.js';
import { ConnectFailure, ExecutionFailure, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { ExecutionEngine } from './executor.js';
import { joinKey, tableKey } from './keys.js';
import { executionUnits, unitSql } from './planner.js';
import { countInserts, toConflictTolerant } from './upsert.js';

/** One side of a sync: credentials for the client tools plus an open connection. */
export interface SyncSide {
  creds: EnvironmentCredentials;
  db: IStreamingConnection;
}

interface Extraction {
  sql: string;
  extraction: 'dump' | 'cursor';
}

const REPLICA_ON = 'SET session_replication_role = replica;';
const REPLICA_OFF = 'SET session_replication_role = DEFAULT;';

export class DataSyncEngine {
  private ddl = new PostgresDDLGenerator();

  constructor(
    private resolver: ConnectionResolver,
    private tools: IPgTools,
    private executor: ExecutionEngine,
    private inspector: ISchemaInspector,
    private extractor: IDataExtractor = new PostgresExtractor()
  ) {}

  /**
   * Copies rows table by table. Incremental mode never touches existing
   * target rows; replace mode truncates each table and reloads it inside one
   * transaction.
   */
  async sync(source: SyncSide, target: SyncSide, tables: readonly TableRef[], mode: SyncMode): Promise<SyncReport> {
    const report: SyncReport = { mode, tables: [], pendingBackfill: [] };

    for (const table of tables) {
      try {
        report.tables.push(await this.syncTable(source, target, table, mode.data));
      } catch (error) {
        // any failed load ends the run; later tables may depend on this one
        if (error instanceof ExecutionFailure) {
          logger.error({ table: tableKey(table), kind: error.kind, error: error.lastError }, 'Data load failed, stopping');
        }
        throw error;
      }
    }

    logger.info({ tables: report.tables.length, mode: mode.data }, 'Data sync finished');
    return report;
  }

  private async syncTable(source: SyncSide, target: SyncSide, table: TableRef, mode: DataMode): Promise<TableSyncResult> {
    const key = tableKey(table);
    const sourceRows = await this.inspector.countRows(source.db, table);
    const targetRowsBefore = await this.inspector.countRows(target.db, table);

    if (sourceRows === 0 && mode === 'incremental') {
      logger.info(`${key}: source is empty, nothing to copy`);
      return { table: key, extraction: 'none', statements: 0, sourceRows, targetRowsBefore, targetRowsAfter: targetRowsBefore };
    }

    const { sql, extraction } = sourceRows > 0 ? await this.extract(source, table) : { sql: '', extraction: 'none' as const };
    const body = mode === 'incremental' ? toConflictTolerant(sql) : { sql, inserts: countInserts(sql) };

    const script =
      mode === 'replace'
        ? [REPLICA_ON, 'BEGIN;', this.ddl.generateTruncate(table), body.sql, 'COMMIT;', REPLICA_OFF]
        : [REPLICA_ON, body.sql, REPLICA_OFF];

    // loads run to completion so every failing row shows up in the output
    await this.executor.execute(target.creds, script.join('\n'), `data for ${key}`, { mode, stopOnError: false });

    const targetRowsAfter = await this.inspector.countRows(target.db, table);
    logger.info({ table: key, extraction, statements: body.inserts, sourceRows, targetRowsBefore, targetRowsAfter }, `Synced ${key}`);

    if (mode === 'replace' && targetRowsAfter !== sourceRows) {
      logger.warn({ table: key, sourceRows, targetRowsAfter }, 'Row counts differ after replace');
    }
    return { table: key, extraction, statements: body.inserts, sourceRows, targetRowsBefore, targetRowsAfter };
  }

  /** Dumps one table's rows as INSERTs, falling back to a cursor read when pg_dump is unusable. */
  async extract(side: SyncSide, table: TableRef): Promise<Extraction> {
    const key = tableKey(table);

    if (await this.tools.isAvailable('pg_dump')) {
      try {
        const sql = await this.resolver.withEndpoints<string>(side.creds, `Dumping ${key}`, async target => {
          const result = await this.tools.dump(target, { table });
          return result.exitCode === 0 ? { ok: true, value: result.output } : { ok: false, error: result.output };
        });
        return { sql, extraction: 'dump' };
      } catch (error) {
        if (!(error instanceof ConnectFailure)) throw error;
        logger.warn({ table: key, error: errorMessage(error) }, 'pg_dump failed on every endpoint, using cursor extraction');
      }
    }

    const statements: string[] = [];
    for await (const chunk of this.extractor.streamTableData(side.db, table)) {
      statements.push(...chunk);
    }
    return { sql: statements.length ? statements.join('\n') + '\n' : '', extraction: 'cursor' };
  }

  /**
   * Applies schema operations to a table without losing its rows. Existing
   * rows are captured first and loaded back only when the change left fewer
   * rows behind; deferred NOT NULL columns are then enforced where the data
   * allows it.
   */
  async preserveAndApply(
    target: SyncSide,
    table: TableRef,
    operations: readonly Operation[],
    deferred: readonly DeferredNotNull[]
  ): Promise<{ results: OperationResult[]; pending: string[] }> {
    const key = tableKey(table);
    const before = await this.inspector.countRows(target.db, table);
    const backup = before > 0 ? await this.extract(target, table) : null;
    if (backup) logger.info({ table: key, rows: before, extraction: backup.extraction }, 'Captured target rows before schema change');

    const results: OperationResult[] = [];
    for (const unit of executionUnits(operations)) {
      results.push(
        await this.executor.execute(target.creds, unitSql(unit), unit[0].targetObject, { mode: 'incremental', stopOnError: true })
      );
    }

    if (backup && backup.sql) {
      const after = await this.inspector.countRows(target.db, table);
      if (after < before) {
        logger.warn({ table: key, before, after }, 'Rows lost during schema change, restoring');
        const restore = toConflictTolerant(backup.sql);
        await this.executor.execute(target.creds, [REPLICA_ON, restore.sql, REPLICA_OFF].join('\n'), `restore of ${key}`, {
          mode: 'incremental',
          stopOnError: false,
        });
        const restored = await this.inspector.countRows(target.db, table);
        if (restored < before) logger.warn({ table: key, before, after: restored }, 'Fewer rows after restore');
      }
    }

    const pending = await this.enforceNotNull(
      target,
      deferred.filter(d => d.schema === table.schema && d.table === table.name)
    );
    return { results, pending };
  }

  /** Sets NOT NULL on each deferred column that holds no NULLs; returns the rest. */
  async enforceNotNull(target: SyncSide, deferred: readonly DeferredNotNull[]): Promise<string[]> {
    const pending: string[] = [];

    for (const column of deferred) {
      const ref: TableRef = { schema: column.schema, name: column.table };
      const key = joinKey(column.schema, column.table, column.column);
      const nulls = await this.inspector.countNulls(target.db, ref, column.column);

      if (nulls > 0) {
        logger.warn({ column: key, nulls }, 'Column left nullable, manual backfill required');
        pending.push(key);
        continue;
      }
      await this.executor.execute(target.creds, this.ddl.generateSetNotNull(ref, column.column), `NOT NULL on ${key}`, {
        mode: 'incremental',
      });
    }
    return pending;
  }
}
