import { z } from 'zod';
import { Endpoint, EnvironmentCredentials } from '../types/index.js';
import { ConfigurationError } from '../utils/errors.js';

const ENV_ALIASES: Record<string, string> = {
  prod: 'PROD',
  production: 'PROD',
  main: 'PROD',
  test: 'TEST',
  staging: 'TEST',
  dev: 'DEV',
  develop: 'DEV',
};

export const DEFAULT_POOLER_REGION = 'aws-1-us-east-2';
export const DEFAULT_POOLER_PORT = 6543;
export const DIRECT_PORT = 5432;

const credentialsSchema = z.object({
  projectRef: z.string().min(1),
  password: z.string().min(1),
  poolerRegion: z.string().min(1).default(DEFAULT_POOLER_REGION),
  poolerPort: z.string().default(String(DEFAULT_POOLER_PORT)).transform(Number).pipe(z.number().int().positive()),
  accessToken: z.string().min(1).optional(),
  poolerHost: z.string().min(1).optional(),
});

export function envPrefix(name: string): string {
  const key = name.trim().toLowerCase();
  return ENV_ALIASES[key] ?? key.toUpperCase().replace(/[^A-Z0-9]/g, '_');
}

/**
 * Reads the credentials of one named environment from process-style variables.
 * `prod`, `test` and `dev` accept their usual aliases.
 */
export function loadEnvironment(
  name: string,
  env: Record<string, string | undefined> = process.env
): EnvironmentCredentials {
  const prefix = `SUPABASE_${envPrefix(name)}`;
  const emptyToUndefined = (value: string | undefined) => (value === '' ? undefined : value);

  const parsed = credentialsSchema.safeParse({
    projectRef: emptyToUndefined(env[`${prefix}_PROJECT_REF`]),
    password: emptyToUndefined(env[`${prefix}_DB_PASSWORD`]),
    poolerRegion: emptyToUndefined(env[`${prefix}_POOLER_REGION`]),
    poolerPort: emptyToUndefined(env[`${prefix}_POOLER_PORT`]),
    accessToken: emptyToUndefined(env.SUPABASE_ACCESS_TOKEN),
    poolerHost: emptyToUndefined(env.SUPABASE_POOLER_HOST),
  });

  if (!parsed.success) {
    const fields = parsed.error.issues.map(issue => issue.path.join('.'));
    throw new ConfigurationError(
      `Incomplete configuration for environment "${name}" (expected ${prefix}_* variables): ${fields.join(', ')}`,
      { errors: parsed.error.issues }
    );
  }

  return { name, ...parsed.data };
}

export function poolerEndpoint(creds: EnvironmentCredentials, host?: string, kind: Endpoint['kind'] = 'pooler'): Endpoint {
  return Object.freeze({
    host: host ?? creds.poolerHost ?? `${creds.poolerRegion}.pooler.supabase.com`,
    port: creds.poolerPort,
    user: `postgres.${creds.projectRef}`,
    label: kind === 'api-pooler' ? 'API-resolved pooler' : 'shared pooler',
    kind,
  });
}

export function directEndpoint(creds: EnvironmentCredentials): Endpoint {
  return Object.freeze({
    host: `db.${creds.projectRef}.supabase.co`,
    port: DIRECT_PORT,
    user: 'postgres',
    label: 'direct host',
    kind: 'direct' as const,
  });
}
