import { describe, expect, it } from 'vitest';
import { column, grant } from '../test/fakes.js';
import { columnKey, grantKey, joinKey, ownerKey, tableKey } from './keys.js';

describe('keys', () => {
  it('should keep plain names readable', () => {
    expect(tableKey({ schema: 'public', name: 'orders' })).toBe('public.orders');
    expect(columnKey(column('orders', 'total'))).toBe('public.orders.total');
    expect(ownerKey({ schema: 'public', table: 'orders' })).toBe('public.orders');
  });

  it('should not let dotted names collide with nested ones', () => {
    const dotted = columnKey(column('a.b', 'c'));
    const nested = columnKey(column('a', 'b.c'));

    expect(dotted).toBe('public."a.b".c');
    expect(nested).toBe('public.a."b.c"');
    expect(dotted).not.toBe(nested);
    expect(joinKey('Mixed', 'say "hi"')).toBe('"Mixed"."say ""hi"""');
  });

  it('should tell grants on same-named objects of different kinds apart', () => {
    const onTable = grant('orders', 'anon', 'SELECT');
    const onSequence = grant('orders', 'anon', 'SELECT', { objectType: 'SEQUENCE' });

    expect(grantKey(onTable)).toBe('table public.orders:anon:SELECT');
    expect(grantKey(onSequence)).toBe('sequence public.orders:anon:SELECT');
  });
});
