import { Pool, PoolClient } from 'pg';
import { IStreamingConnection, QueryParam } from '../engines/interfaces.js';
import { ConnectionConfig, Endpoint } from '../types/index.js';
import { logger } from '../utils/logger.js';

export class DbConnection implements IStreamingConnection {
  private pool: Pool;

  constructor(config: ConnectionConfig, public readonly endpoint?: Endpoint) {
    this.pool = new Pool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl === false ? false : { rejectUnauthorized: false },
      max: 1,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: config.connectTimeoutMs ?? 10000,
    });

    this.pool.on('error', (err) => {
      logger.error(err, 'Unexpected error on idle client');
    });
  }

  async getClient(): Promise<PoolClient> {
    return await this.pool.connect();
  }

  async query<T extends object = Record<string, unknown>>(text: string, params?: QueryParam[]): Promise<T[]> {
    const start = Date.now();
    try {
      const res = await this.pool.query(text, params);
      const duration = Date.now() - start;
      logger.debug({ query: text, duration, rows: res.rowCount }, 'Executed query');
      return res.rows;
    } catch (error) {
      logger.error({ query: text, error }, 'Query execution failed');
      throw error;
    }
  }

  async close() {
    await this.pool.end();
    logger.debug({ endpoint: this.endpoint?.label }, 'Database connection pool closed');
  }
}
