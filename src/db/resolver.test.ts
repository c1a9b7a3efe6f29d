import { describe, expect, it, vi } from 'vitest';
import { IManagementApi } from '../engines/interfaces.js';
import { credentials, FakeConnection } from '../test/fakes.js';
import { Endpoint } from '../types/index.js';
import { ConnectFailure } from '../utils/errors.js';
import { classifyConnectError, ConnectionResolver } from './resolver.js';

function refusing(hosts: string[]) {
  const opened: Endpoint[] = [];
  const connect = (_config: unknown, endpoint: Endpoint) => {
    opened.push(endpoint);
    return new FakeConnection(() => {
      if (hosts.includes(endpoint.host)) {
        throw Object.assign(new Error(`connect ECONNREFUSED ${endpoint.host}`), { code: 'ECONNREFUSED' });
      }
      return [{ '?column?': 1 }];
    }, endpoint);
  };
  return { opened, connect };
}

describe('ConnectionResolver', () => {
  it('should use the shared pooler when it answers', async () => {
    const { opened, connect } = refusing([]);
    const resolver = new ConnectionResolver({ connectTimeoutMs: 1000, connect });

    const conn = await resolver.resolve(credentials(), 'introspection');

    expect(conn.endpoint?.label).toBe('shared pooler');
    expect(opened.map(e => e.kind)).toEqual(['pooler']);
  });

  it('should fall back to the direct host and close the failed connection', async () => {
    const created: FakeConnection[] = [];
    const { connect } = refusing(['aws-1-us-east-2.pooler.supabase.com']);
    const resolver = new ConnectionResolver({
      connectTimeoutMs: 1000,
      connect: (config, endpoint) => {
        const conn = connect(config, endpoint);
        created.push(conn);
        return conn;
      },
    });

    const conn = await resolver.resolve(credentials(), 'introspection');

    expect(conn.endpoint?.kind).toBe('direct');
    expect(created[0].close).toHaveBeenCalledTimes(1);
    expect(created[1].close).not.toHaveBeenCalled();
  });

  it('should try the API-resolved pooler between shared pooler and direct host', async () => {
    const api: IManagementApi = { resolveHost: vi.fn(async () => 'aws-0-us-east-1.pooler.supabase.com') };
    const { opened, connect } = refusing(['aws-1-us-east-2.pooler.supabase.com', 'aws-0-us-east-1.pooler.supabase.com']);
    const resolver = new ConnectionResolver({ connectTimeoutMs: 1000, connect, managementApi: api });

    const conn = await resolver.resolve(credentials({ accessToken: 'test-token' }), 'introspection');

    expect(opened.map(e => `${e.kind}:${e.host}:${e.user}`)).toEqual([
      'pooler:aws-1-us-east-2.pooler.supabase.com:postgres.abcdefghijklmnop',
      'api-pooler:aws-0-us-east-1.pooler.supabase.com:postgres.abcdefghijklmnop',
      'direct:db.abcdefghijklmnop.supabase.co:postgres',
    ]);
    expect(conn.endpoint?.kind).toBe('direct');
    expect(api.resolveHost).toHaveBeenCalledWith('abcdefghijklmnop', 'test-token');
  });

  it('should skip the API lookup without an access token', async () => {
    const api: IManagementApi = { resolveHost: vi.fn(async () => 'other.pooler.supabase.com') };
    const { connect } = refusing(['aws-1-us-east-2.pooler.supabase.com']);
    const resolver = new ConnectionResolver({ connectTimeoutMs: 1000, connect, managementApi: api });

    await resolver.resolve(credentials(), 'introspection');

    expect(api.resolveHost).not.toHaveBeenCalled();
  });

  it('should list every tried endpoint when all fail', async () => {
    const api: IManagementApi = {
      resolveHost: vi.fn(async () => {
        throw new Error('Request failed with status code 401');
      }),
    };
    const { connect } = refusing(['aws-1-us-east-2.pooler.supabase.com', 'db.abcdefghijklmnop.supabase.co']);
    const resolver = new ConnectionResolver({ connectTimeoutMs: 1000, connect, managementApi: api });

    const error = await resolver.resolve(credentials({ accessToken: 'test-token' }), 'introspection').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConnectFailure);
    expect(error).toMatchObject({ environment: 'test', stage: 'connect' });
    if (error instanceof ConnectFailure) {
      expect(error.attempts.map(a => [a.endpoint.label, a.reason])).toEqual([
        ['shared pooler', 'refused'],
        ['management API lookup', 'unknown'],
        ['direct host', 'refused'],
      ]);
    }
  });

  it('should walk endpoints until an attempt succeeds', async () => {
    const resolver = new ConnectionResolver({ connectTimeoutMs: 1000, connect: refusing([]).connect });
    const attempt = vi
      .fn()
      .mockResolvedValueOnce({ ok: false, error: 'FATAL: too many connections' })
      .mockResolvedValueOnce({ ok: true, value: 'done' });

    const value = await resolver.withEndpoints(credentials(), 'restore', attempt);

    expect(value).toBe('done');
    expect(attempt.mock.calls.map(call => call[0].endpoint.kind)).toEqual(['pooler', 'direct']);
    expect(attempt.mock.calls[0][0]).toMatchObject({ password: 'test-secret', database: 'postgres', projectRef: 'abcdefghijklmnop' });
  });
});

describe('classifyConnectError', () => {
  it('should recognise common failure causes', () => {
    expect(classifyConnectError(Object.assign(new Error('getaddrinfo ENOTFOUND db.x.supabase.co'), { code: 'ENOTFOUND' }))).toBe('dns');
    expect(classifyConnectError(new Error('password authentication failed for user "postgres"'))).toBe('auth');
    expect(classifyConnectError(new Error('Connection terminated due to connection timeout'))).toBe('timeout');
    expect(classifyConnectError(new Error('The server does not support SSL connections'))).toBe('tls');
    expect(classifyConnectError('boom')).toBe('unknown');
  });
});
