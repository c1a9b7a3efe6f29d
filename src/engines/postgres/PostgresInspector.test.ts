import { describe, expect, it } from 'vitest';
import { FakeConnection } from '../../test/fakes.js';
import { IntrospectionFailure } from '../../utils/errors.js';
import { policyCommandFromCatalog, PostgresInspector } from './PostgresInspector.js';

const inspector = new PostgresInspector({ excludedSchemas: ['auth', 'storage'], managedRoles: ['postgres', 'supabase_admin'] });

function catalog(overrides: { extensions?: object[] } = {}) {
  return new FakeConnection(sql => {
    if (/relrowsecurity/.test(sql)) {
      return [
        { schema: 'public', name: 'orders', rlsEnabled: true, rlsForced: false, primaryKey: ['id'] },
        { schema: 'public', name: 'items', rlsEnabled: false, rlsForced: false, primaryKey: [] },
      ];
    }
    if (/information_schema\.columns/.test(sql)) {
      return [
        { schema: 'public', table: 'orders', name: 'total', dataType: 'numeric', formattedType: 'numeric(10,2)', isNullable: false, defaultExpr: '0', attidentity: '', ordinalPosition: 2 },
        { schema: 'public', table: 'orders', name: 'id', dataType: 'bigint', formattedType: 'bigint', isNullable: false, defaultExpr: null, attidentity: 'a', ordinalPosition: 1 },
      ];
    }
    if (/FROM pg_sequence/.test(sql)) {
      return [
        { schema: 'public', name: 'orders_number_seq', dataType: 'integer', increment: '1', minValue: '1', maxValue: '2147483647', start: '1000', cycle: false, ownerSchema: 'public', ownerTable: 'orders', ownerColumn: 'number' },
        { schema: 'public', name: 'invoice_seq', dataType: 'bigint', increment: '5', minValue: '1', maxValue: '9223372036854775807', start: '1', cycle: true, ownerSchema: null, ownerTable: null, ownerColumn: null },
      ];
    }
    if (/pg_get_constraintdef/.test(sql)) {
      return [{ schema: 'public', table: 'orders', name: 'orders_pkey', contype: 'p', definition: 'PRIMARY KEY (id)' }];
    }
    if (/FROM pg_policy/.test(sql)) {
      return [
        { schema: 'public', table: 'orders', policyName: 'owner_write', cmd: 'w', permissive: true, roles: ['authenticated', 'anon'], usingExpr: '(auth.uid() = owner)', checkExpr: null },
        { schema: 'public', table: 'orders', policyName: 'everyone_read', cmd: 'r', permissive: false, roles: [], usingExpr: 'true', checkExpr: null },
      ];
    }
    if (/aclexplode/.test(sql)) {
      return [
        { schema: 'public', object: 'orders', objectType: 'TABLE', grantee: 'authenticated', privilege: 'SELECT', isGrantable: false },
        { schema: 'public', object: 'orders', objectType: 'TABLE', grantee: 'postgres', privilege: 'SELECT', isGrantable: true },
        { schema: 'public', object: 'orders', objectType: 'TABLE', grantee: 'pg_read_all_data', privilege: 'SELECT', isGrantable: false },
      ];
    }
    if (/FROM pg_extension/.test(sql)) {
      return overrides.extensions ?? [{ name: 'pgcrypto', schema: 'extensions', version: '1.3' }];
    }
    if (/FROM cron\.job/.test(sql)) {
      return [{ jobName: 'nightly', schedule: '0 3 * * *', command: 'SELECT 1', active: true }];
    }
    return [];
  });
}

describe('PostgresInspector', () => {
  it('should build a sorted snapshot from the catalog', async () => {
    const snapshot = await inspector.introspect(catalog());

    expect(snapshot.tables.map(t => t.name)).toEqual(['items', 'orders']);
    expect(snapshot.columns.map(c => c.name)).toEqual(['id', 'total']);
    expect(snapshot.constraints).toEqual([
      { schema: 'public', table: 'orders', name: 'orders_pkey', type: 'PRIMARY KEY', definition: 'PRIMARY KEY (id)' },
    ]);
    expect(snapshot.extensions).toEqual([{ name: 'pgcrypto', schema: 'extensions', version: '1.3' }]);
    expect(snapshot.scheduledJobs).toEqual([]);
  });

  it('should read sequences with their owning column and identity columns', async () => {
    const snapshot = await inspector.introspect(catalog());

    expect(snapshot.sequences).toEqual([
      { schema: 'public', name: 'invoice_seq', dataType: 'bigint', increment: '5', minValue: '1', maxValue: '9223372036854775807', start: '1', cycle: true, ownedBy: null },
      {
        schema: 'public',
        name: 'orders_number_seq',
        dataType: 'integer',
        increment: '1',
        minValue: '1',
        maxValue: '2147483647',
        start: '1000',
        cycle: false,
        ownedBy: { schema: 'public', table: 'orders', column: 'number' },
      },
    ]);
    expect(snapshot.columns.map(c => [c.name, c.identity])).toEqual([
      ['id', 'ALWAYS'],
      ['total', null],
    ]);
  });

  it('should map policy commands and default empty roles to public', async () => {
    const { policies } = await inspector.introspect(catalog());

    expect(policies.map(p => [p.policyName, p.command, p.roles, p.permissive])).toEqual([
      ['everyone_read', 'SELECT', ['public'], false],
      ['owner_write', 'UPDATE', ['anon', 'authenticated'], true],
    ]);
  });

  it('should leave out grants held by managed roles', async () => {
    const { grants } = await inspector.introspect(catalog());

    expect(grants).toEqual([
      { schema: 'public', object: 'orders', objectType: 'TABLE', grantee: 'authenticated', privilege: 'SELECT', isGrantable: false },
    ]);
  });

  it('should read scheduled jobs only when pg_cron is installed', async () => {
    const db = catalog({ extensions: [{ name: 'pg_cron', schema: 'pg_catalog', version: '1.6' }] });

    const snapshot = await inspector.introspect(db);

    expect(snapshot.scheduledJobs).toEqual([{ jobName: 'nightly', schedule: '0 3 * * *', command: 'SELECT 1', active: true }]);
  });

  it('should pass excluded schemas to filtered catalog queries', async () => {
    const db = catalog();

    await inspector.introspect(db);

    expect(db.query.mock.calls[0][1]).toEqual([['auth', 'storage']]);
  });

  it('should wrap catalog errors with the failing query', async () => {
    const db = new FakeConnection(() => {
      throw new Error('permission denied for table pg_authid');
    });

    const error = await inspector.introspect(db).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(IntrospectionFailure);
    expect(error).toMatchObject({ message: 'Catalog query for tables failed: permission denied for table pg_authid', stage: 'introspection' });
  });

  it('should count rows and nulls on quoted identifiers', async () => {
    const db = new FakeConnection(() => [{ count: '7' }]);

    await expect(inspector.countRows(db, { schema: 'public', name: 'orders' })).resolves.toBe(7);
    await expect(inspector.countNulls(db, { schema: 'public', name: 'orders' }, 'total')).resolves.toBe(7);
    expect(db.sqlSent()).toEqual([
      'SELECT count(*) AS count FROM "public"."orders"',
      'SELECT count(*) AS count FROM "public"."orders" WHERE "total" IS NULL',
    ]);
  });
});

describe('policyCommandFromCatalog', () => {
  it('should reject unknown command letters', () => {
    expect(policyCommandFromCatalog('*')).toBe('ALL');
    expect(() => policyCommandFromCatalog('z')).toThrow('Unknown policy command "z" in pg_policy');
  });
});
