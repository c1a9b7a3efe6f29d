import { describe, expect, it, vi } from 'vitest';
import { ISchemaInspector } from '../engines/interfaces.js';
import { column, emptySnapshot, FakeConnection, policy, sequence, table } from '../test/fakes.js';
import { Snapshot } from '../types/index.js';
import { Verifier } from './verifier.js';

function inspectorReturning(source: Snapshot, target: Snapshot) {
  return {
    introspect: vi.fn().mockResolvedValueOnce(source).mockResolvedValueOnce(target),
    listTables: vi.fn(),
    countRows: vi.fn().mockResolvedValueOnce(10).mockResolvedValueOnce(8),
    countNulls: vi.fn(),
  } satisfies ISchemaInspector;
}

const options = { sourceEnv: 'prod', targetEnv: 'dev', excludedSchemas: ['auth', 'storage'] };

describe('Verifier', () => {
  it('should report a clean comparison', async () => {
    const snapshot = emptySnapshot({ tables: [table('orders')], columns: [column('orders', 'id')] });
    const verifier = new Verifier(inspectorReturning(snapshot, snapshot));

    const report = await verifier.verify(new FakeConnection(), new FakeConnection(), options);

    expect(report.clean).toBe(true);
    expect(report.items).toEqual([]);
    expect(report.expectedExclusions).toEqual(['auth', 'storage']);
  });

  it('should name every residual difference', async () => {
    const source = emptySnapshot({
      tables: [table('orders', { rlsEnabled: true }), table('items')],
      columns: [column('orders', 'total', { formattedType: 'numeric(10,2)' })],
      policies: [policy('orders', 'read_own', { roles: ['anon', 'authenticated'] })],
    });
    const target = emptySnapshot({
      tables: [table('orders'), table('legacy')],
      columns: [column('orders', 'total', { formattedType: 'numeric' })],
      policies: [policy('orders', 'read_own')],
    });
    const verifier = new Verifier(inspectorReturning(source, target));

    const report = await verifier.verify(new FakeConnection(), new FakeConnection(), options);

    expect(report.clean).toBe(false);
    expect(report.items).toEqual([
      { category: 'tables', change: 'missing_in_target', name: 'public.items', details: '' },
      { category: 'tables', change: 'extra_in_target', name: 'public.legacy', details: '' },
      { category: 'columns', change: 'mismatch', name: 'public.orders.total', details: 'formattedType: numeric(10,2) -> numeric' },
      { category: 'policies', change: 'mismatch', name: 'public.orders.read_own', details: 'roles: {anon,authenticated} -> {authenticated}' },
      { category: 'rls', change: 'mismatch', name: 'public.orders', details: 'rlsEnabled: true -> false' },
    ]);
    expect(report.counts).toMatchObject({ tables: 2, columns: 1, policies: 1, rls: 1, grants: 0 });
  });

  it('should name sequence differences with their owning column', async () => {
    const source = emptySnapshot({ sequences: [sequence('orders_id_seq', { ownedBy: { schema: 'public', table: 'orders', column: 'id' } })] });
    const target = emptySnapshot({ sequences: [sequence('orders_id_seq')] });
    const verifier = new Verifier(inspectorReturning(source, target));

    const report = await verifier.verify(new FakeConnection(), new FakeConnection(), options);

    expect(report.items).toEqual([
      {
        category: 'sequences',
        change: 'mismatch',
        name: 'public.orders_id_seq',
        details: 'ownedBy: {"schema":"public","table":"orders","column":"id"} -> null',
      },
    ]);
  });

  it('should compare row counts of the requested tables', async () => {
    const verifier = new Verifier(inspectorReturning(emptySnapshot(), emptySnapshot()));

    const report = await verifier.verify(new FakeConnection(), new FakeConnection(), {
      ...options,
      rowCountTables: [{ schema: 'public', name: 'orders' }],
    });

    expect(report.rowCounts).toEqual([{ table: 'public.orders', source: 10, target: 8 }]);
  });
});
