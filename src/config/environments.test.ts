import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../utils/errors.js';
import { directEndpoint, envPrefix, loadEnvironment, poolerEndpoint } from './environments.js';

describe('environments', () => {
  const env = {
    SUPABASE_PROD_PROJECT_REF: 'prodref000000000',
    SUPABASE_PROD_DB_PASSWORD: 'test-secret',
    SUPABASE_DEV_PROJECT_REF: 'devref0000000000',
    SUPABASE_DEV_DB_PASSWORD: 'test-secret',
    SUPABASE_DEV_POOLER_REGION: 'aws-0-eu-west-1',
    SUPABASE_DEV_POOLER_PORT: '5432',
    SUPABASE_ACCESS_TOKEN: 'test-token',
  };

  it('should map environment aliases to their variable prefix', () => {
    expect(envPrefix('production')).toBe('PROD');
    expect(envPrefix('main')).toBe('PROD');
    expect(envPrefix('staging')).toBe('TEST');
    expect(envPrefix('develop')).toBe('DEV');
    expect(envPrefix('qa-2')).toBe('QA_2');
  });

  it('should load credentials with pooler defaults', () => {
    expect(loadEnvironment('prod', env)).toEqual({
      name: 'prod',
      projectRef: 'prodref000000000',
      password: 'test-secret',
      poolerRegion: 'aws-1-us-east-2',
      poolerPort: 6543,
      accessToken: 'test-token',
    });
  });

  it('should honour per-environment pooler overrides', () => {
    const creds = loadEnvironment('dev', env);

    expect(creds.poolerRegion).toBe('aws-0-eu-west-1');
    expect(creds.poolerPort).toBe(5432);
  });

  it('should name the missing variables', () => {
    expect(() => loadEnvironment('test', env)).toThrow(ConfigurationError);
    expect(() => loadEnvironment('test', env)).toThrow(/SUPABASE_TEST_\* variables\): projectRef, password/);
  });

  it('should build pooled and direct endpoints', () => {
    const creds = loadEnvironment('prod', env);

    expect(poolerEndpoint(creds)).toEqual({
      host: 'aws-1-us-east-2.pooler.supabase.com',
      port: 6543,
      user: 'postgres.prodref000000000',
      label: 'shared pooler',
      kind: 'pooler',
    });
    expect(directEndpoint(creds)).toEqual({
      host: 'db.prodref000000000.supabase.co',
      port: 5432,
      user: 'postgres',
      label: 'direct host',
      kind: 'direct',
    });
    expect(Object.isFrozen(directEndpoint(creds))).toBe(true);
  });
});
