import { beforeEach, describe, expect, it, vi } from 'vitest';
import { IDataExtractor, IDbConnection, ISchemaInspector } from '../engines/interfaces.js';
import { credentials, FakeConnection, FakePgTools, fakeResolver } from '../test/fakes.js';
import { TableRef } from '../types/index.js';
import { Operation } from '../types/plan.js';
import { ExecutionFailure } from '../utils/errors.js';
import { DataSyncEngine, SyncSide } from './data-sync.js';
import { ExecutionEngine } from './executor.js';

const ORDERS: TableRef = { schema: 'public', name: 'orders' };
const DUMP = 'INSERT INTO public.orders (id) VALUES (1);\nINSERT INTO public.orders (id) VALUES (2);\n';

function fakeInspector() {
  return {
    introspect: vi.fn(),
    listTables: vi.fn(),
    countRows: vi.fn(async (_db: IDbConnection, _table: TableRef) => 0),
    countNulls: vi.fn(async (_db: IDbConnection, _table: TableRef, _column: string) => 0),
  } satisfies ISchemaInspector;
}

describe('DataSyncEngine', () => {
  let tools: FakePgTools;
  let inspector: ReturnType<typeof fakeInspector>;
  let extractor: IDataExtractor;
  let engine: DataSyncEngine;
  let source: SyncSide;
  let target: SyncSide;

  beforeEach(() => {
    const resolver = fakeResolver();
    tools = new FakePgTools();
    inspector = fakeInspector();
    extractor = {
      async *streamTableData() {
        yield ['INSERT INTO "public"."orders" ("id") VALUES (1);'];
      },
    };
    engine = new DataSyncEngine(resolver, tools, new ExecutionEngine(resolver, tools), inspector, extractor);
    source = { creds: credentials({ name: 'prod' }), db: new FakeConnection() };
    target = { creds: credentials({ name: 'dev', projectRef: 'devref0000000000' }), db: new FakeConnection() };
  });

  it('should load dumped rows without touching existing ones in incremental mode', async () => {
    inspector.countRows.mockResolvedValueOnce(2).mockResolvedValueOnce(0).mockResolvedValueOnce(2);
    tools.dump.mockResolvedValueOnce({ exitCode: 0, output: DUMP });

    const report = await engine.sync(source, target, [ORDERS], { scope: 'schema-and-data', data: 'incremental' });

    expect(tools.dump.mock.calls[0][1]).toEqual({ table: ORDERS });
    expect(tools.scripts()).toEqual([
      'SET session_replication_role = replica;\n' +
        'INSERT INTO public.orders (id) VALUES (1) ON CONFLICT DO NOTHING;\n' +
        'INSERT INTO public.orders (id) VALUES (2) ON CONFLICT DO NOTHING;\n' +
        '\nSET session_replication_role = DEFAULT;',
    ]);
    expect(tools.runScript.mock.calls[0][2]).toEqual({ stopOnError: false });
    expect(report.tables).toEqual([
      { table: 'public.orders', extraction: 'dump', statements: 2, sourceRows: 2, targetRowsBefore: 0, targetRowsAfter: 2 },
    ]);
  });

  it('should truncate and reload inside one transaction in replace mode', async () => {
    inspector.countRows.mockResolvedValueOnce(1).mockResolvedValueOnce(5).mockResolvedValueOnce(1);
    tools.dump.mockResolvedValueOnce({ exitCode: 0, output: 'INSERT INTO public.orders (id) VALUES (1);\n' });

    const report = await engine.sync(source, target, [ORDERS], { scope: 'schema-and-data', data: 'replace' });

    expect(tools.scripts()).toEqual([
      [
        'SET session_replication_role = replica;',
        'BEGIN;',
        'TRUNCATE TABLE "public"."orders" RESTART IDENTITY CASCADE;',
        'INSERT INTO public.orders (id) VALUES (1);\n',
        'COMMIT;',
        'SET session_replication_role = DEFAULT;',
      ].join('\n'),
    ]);
    expect(report.tables[0]).toMatchObject({ statements: 1, targetRowsBefore: 5, targetRowsAfter: 1 });
  });

  it('should empty the target table in replace mode even when the source is empty', async () => {
    inspector.countRows.mockResolvedValueOnce(0).mockResolvedValueOnce(4).mockResolvedValueOnce(0);

    const report = await engine.sync(source, target, [ORDERS], { scope: 'schema-and-data', data: 'replace' });

    expect(tools.dump).not.toHaveBeenCalled();
    expect(tools.scripts()[0]).toContain('TRUNCATE TABLE "public"."orders" RESTART IDENTITY CASCADE;');
    expect(report.tables[0]).toMatchObject({ extraction: 'none', statements: 0, targetRowsAfter: 0 });
  });

  it('should skip an empty source in incremental mode', async () => {
    inspector.countRows.mockResolvedValueOnce(0).mockResolvedValueOnce(3);

    const report = await engine.sync(source, target, [ORDERS], { scope: 'schema-and-data', data: 'incremental' });

    expect(tools.runScript).not.toHaveBeenCalled();
    expect(report.tables[0]).toEqual({
      table: 'public.orders',
      extraction: 'none',
      statements: 0,
      sourceRows: 0,
      targetRowsBefore: 3,
      targetRowsAfter: 3,
    });
  });

  it('should read through a cursor when pg_dump is not installed', async () => {
    tools.isAvailable.mockResolvedValue(false);

    const extraction = await engine.extract(source, ORDERS);

    expect(tools.dump).not.toHaveBeenCalled();
    expect(extraction).toEqual({ sql: 'INSERT INTO "public"."orders" ("id") VALUES (1);\n', extraction: 'cursor' });
  });

  it('should fall back to a cursor once pg_dump fails on every endpoint', async () => {
    tools.dump.mockResolvedValue({ exitCode: 1, output: 'pg_dump: error: connection to server failed: FATAL:  Tenant or user not found' });

    const extraction = await engine.extract(source, ORDERS);

    expect(tools.dump).toHaveBeenCalledTimes(2);
    expect(extraction.extraction).toBe('cursor');
  });

  it('should stop at the first table that fails to load', async () => {
    const items: TableRef = { schema: 'public', name: 'items' };
    inspector.countRows.mockResolvedValue(1);
    tools.dump.mockResolvedValue({ exitCode: 0, output: 'INSERT INTO public.orders (id) VALUES (1);\n' });
    tools.runScript.mockResolvedValueOnce({
      exitCode: 0,
      output: 'psql:<stdin>:2: ERROR:  insert or update on table "orders" violates foreign key constraint "orders_customer_fkey"',
    });

    const error = await engine.sync(source, target, [ORDERS, items], { scope: 'schema-and-data', data: 'incremental' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExecutionFailure);
    expect(error).toMatchObject({
      kind: 'unexpected',
      lastError: 'psql:<stdin>:2: ERROR:  insert or update on table "orders" violates foreign key constraint "orders_customer_fkey"',
    });
    expect(tools.dump).toHaveBeenCalledTimes(1);
    expect(tools.runScript).toHaveBeenCalledTimes(1);
  });

  it('should enforce NOT NULL only on columns without NULLs', async () => {
    inspector.countNulls.mockResolvedValueOnce(3).mockResolvedValueOnce(0);

    const pending = await engine.enforceNotNull(target, [
      { schema: 'public', table: 'orders', column: 'status' },
      { schema: 'public', table: 'orders', column: 'total' },
    ]);

    expect(pending).toEqual(['public.orders.status']);
    expect(tools.scripts()).toEqual(['ALTER TABLE "public"."orders" ALTER COLUMN "total" SET NOT NULL;']);
  });

  it('should leave rows of a table without a key alone when the change keeps them', async () => {
    const logs: TableRef = { schema: 'public', name: 'logs' };
    inspector.countRows.mockResolvedValueOnce(3).mockResolvedValueOnce(3);
    tools.dump.mockResolvedValueOnce({
      exitCode: 0,
      output: [1, 2, 3].map(id => `INSERT INTO public.logs (id) VALUES (${id});`).join('\n') + '\n',
    });
    const addNote: Operation = {
      kind: 'add_column',
      phase: 'pre-data',
      targetObject: 'public.logs.note',
      table: 'public.logs',
      sqlStatement: 'ALTER TABLE "public"."logs" ADD COLUMN IF NOT EXISTS "note" text;',
      destructive: false,
    };

    const { results, pending } = await engine.preserveAndApply(target, logs, [addNote], []);

    expect(tools.scripts()).toEqual(['ALTER TABLE "public"."logs" ADD COLUMN IF NOT EXISTS "note" text;']);
    expect(inspector.countRows).toHaveBeenCalledTimes(2);
    expect(results.map(r => r.classification)).toEqual(['ok']);
    expect(pending).toEqual([]);
  });

  it('should restore captured rows when a change lost them', async () => {
    inspector.countRows.mockResolvedValueOnce(2).mockResolvedValueOnce(0).mockResolvedValueOnce(2);
    tools.dump.mockResolvedValueOnce({ exitCode: 0, output: DUMP });
    const change: Operation = {
      kind: 'alter_column_type',
      phase: 'pre-data',
      targetObject: 'public.orders.id',
      table: 'public.orders',
      sqlStatement: 'ALTER TABLE "public"."orders" ALTER COLUMN "id" TYPE bigint USING "id"::bigint;',
      destructive: false,
    };

    const { results, pending } = await engine.preserveAndApply(target, ORDERS, [change], [
      { schema: 'public', table: 'orders', column: 'id' },
      { schema: 'public', table: 'items', column: 'sku' },
    ]);

    expect(tools.scripts()).toEqual([
      change.sqlStatement,
      'SET session_replication_role = replica;\n' +
        'INSERT INTO public.orders (id) VALUES (1) ON CONFLICT DO NOTHING;\n' +
        'INSERT INTO public.orders (id) VALUES (2) ON CONFLICT DO NOTHING;\n' +
        '\nSET session_replication_role = DEFAULT;',
      'ALTER TABLE "public"."orders" ALTER COLUMN "id" SET NOT NULL;',
    ]);
    expect(tools.runScript.mock.calls[1][2]).toEqual({ stopOnError: false });
    expect(inspector.countNulls).toHaveBeenCalledTimes(1);
    expect(pending).toEqual([]);
    expect(results).toEqual([{ target: 'public.orders.id', classification: 'ok', endpoint: 'shared pooler', output: undefined }]);
  });
});
