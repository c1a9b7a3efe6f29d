import { directEndpoint, poolerEndpoint } from '../config/environments.js';
import { IManagementApi, IStreamingConnection, ToolTarget } from '../engines/interfaces.js';
import { ConnectionConfig, Endpoint, EnvironmentCredentials } from '../types/index.js';
import { ConnectAttempt, ConnectFailure, ConnectFailureReason, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { DbConnection } from './connection.js';

export const DEFAULT_DATABASE = 'postgres';

const MANAGEMENT_LOOKUP: Endpoint = Object.freeze({
  host: 'api.supabase.com',
  port: 443,
  user: '-',
  label: 'management API lookup',
  kind: 'api-pooler' as const,
});

export function classifyConnectError(error: unknown): ConnectFailureReason {
  const code = typeof error === 'object' && error !== null && 'code' in error ? String(error.code) : '';
  const message = errorMessage(error);

  if (code === 'ENOTFOUND' || code === 'EAI_AGAIN' || /could not translate host name|getaddrinfo/i.test(message)) return 'dns';
  if (code === '28P01' || code === '28000' || /authentication failed|password/i.test(message)) return 'auth';
  if (code === 'ETIMEDOUT' || /timeout|timed out/i.test(message)) return 'timeout';
  if (code === 'ECONNREFUSED' || /connection refused/i.test(message)) return 'refused';
  if (/ssl|tls/i.test(message)) return 'tls';
  return 'unknown';
}

/** Collects why each candidate endpoint failed. */
export class FailureAccumulator {
  readonly attempts: ConnectAttempt[] = [];

  record(endpoint: Endpoint, error: unknown, reason: ConnectFailureReason = classifyConnectError(error)): void {
    const message = errorMessage(error);
    this.attempts.push({ endpoint, reason, message });
    logger.warn({ endpoint: endpoint.label, host: endpoint.host, port: endpoint.port, reason }, `Connection via ${endpoint.label} failed: ${message}`);
  }

  get last(): ConnectAttempt | undefined {
    return this.attempts[this.attempts.length - 1];
  }
}

export type AttemptOutcome<T> = { ok: true; value: T } | { ok: false; error: string };

export type ConnectionFactory = (config: ConnectionConfig, endpoint: Endpoint) => IStreamingConnection;

export interface ResolverOptions {
  connectTimeoutMs: number;
  database?: string;
  managementApi?: IManagementApi;
  connect?: ConnectionFactory;
}

/**
 * Yields working connections for an environment by walking its ranked
 * endpoints: shared pooler, then an API-resolved pooler, then the direct host.
 * Nothing is cached; every call starts over because pooler hosts rotate.
 */
export class ConnectionResolver {
  private database: string;
  private connect: ConnectionFactory;

  constructor(private options: ResolverOptions) {
    this.database = options.database ?? DEFAULT_DATABASE;
    this.connect = options.connect ?? ((config, endpoint) => new DbConnection(config, endpoint));
  }

  async *candidates(creds: EnvironmentCredentials, failures: FailureAccumulator): AsyncGenerator<Endpoint> {
    const pooled = poolerEndpoint(creds);
    yield pooled;

    if (creds.accessToken && this.options.managementApi) {
      try {
        const host = await this.options.managementApi.resolveHost(creds.projectRef, creds.accessToken);
        if (host !== pooled.host) {
          yield poolerEndpoint(creds, host, 'api-pooler');
        } else {
          logger.debug({ host }, 'Management API returned the pooler host already tried');
        }
      } catch (error) {
        failures.record(MANAGEMENT_LOOKUP, error);
      }
    }

    yield directEndpoint(creds);
  }

  toolTarget(creds: EnvironmentCredentials, endpoint: Endpoint): ToolTarget {
    return { endpoint, password: creds.password, database: this.database, projectRef: creds.projectRef };
  }

  async tryConnect(creds: EnvironmentCredentials, endpoint: Endpoint): Promise<IStreamingConnection> {
    const conn = this.connect(
      {
        host: endpoint.host,
        port: endpoint.port,
        user: endpoint.user,
        password: creds.password,
        database: this.database,
        connectTimeoutMs: this.options.connectTimeoutMs,
      },
      endpoint
    );

    try {
      await conn.query('SELECT 1');
      return conn;
    } catch (error) {
      await this.closeQuietly(conn);
      throw error;
    }
  }

  async resolve(creds: EnvironmentCredentials, purpose: string): Promise<IStreamingConnection> {
    const failures = new FailureAccumulator();

    for await (const endpoint of this.candidates(creds, failures)) {
      try {
        const conn = await this.tryConnect(creds, endpoint);
        logger.info(`Connected to ${creds.name} for ${purpose} via ${endpoint.label} (${endpoint.host}:${endpoint.port})`);
        return conn;
      } catch (error) {
        failures.record(endpoint, error);
      }
    }

    throw new ConnectFailure(creds.name, failures.attempts);
  }

  /**
   * Runs `attempt` against each candidate until one reports success.
   * Failed attempts move on to the next endpoint; exhausting them throws.
   */
  async withEndpoints<T>(
    creds: EnvironmentCredentials,
    purpose: string,
    attempt: (target: ToolTarget) => Promise<AttemptOutcome<T>>
  ): Promise<T> {
    const failures = new FailureAccumulator();

    for await (const endpoint of this.candidates(creds, failures)) {
      logger.info(`${purpose} on ${creds.name} via ${endpoint.label} (${endpoint.host}:${endpoint.port})`);
      const outcome = await attempt(this.toolTarget(creds, endpoint));
      if (outcome.ok) return outcome.value;
      failures.record(endpoint, new Error(outcome.error));
    }

    throw new ConnectFailure(creds.name, failures.attempts);
  }

  private async closeQuietly(conn: IStreamingConnection): Promise<void> {
    try {
      await conn.close();
    } catch (error) {
      logger.debug({ error: errorMessage(error) }, 'Ignoring close failure on abandoned connection');
    }
  }
}
