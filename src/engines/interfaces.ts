import type { PoolClient } from 'pg';
import { Endpoint, Snapshot, TableRef } from '../types/index.js';

export type QueryParam = string | number | boolean | null | string[];

export interface IDbConnection {
  readonly endpoint?: Endpoint;
  query<T extends object = Record<string, unknown>>(text: string, params?: QueryParam[]): Promise<T[]>;
  close(): Promise<void>;
}

/** A connection that can hand out a dedicated client, needed for cursor reads. */
export interface IStreamingConnection extends IDbConnection {
  getClient(): Promise<PoolClient>;
}

export interface ISchemaInspector {
  introspect(db: IDbConnection): Promise<Snapshot>;
  listTables(db: IDbConnection): Promise<TableRef[]>;
  countRows(db: IDbConnection, table: TableRef): Promise<number>;
  countNulls(db: IDbConnection, table: TableRef, column: string): Promise<number>;
}

export interface IDataExtractor {
  streamTableData(db: IStreamingConnection, table: TableRef, chunkSize?: number): AsyncGenerator<string[]>;
}

/** Captured result of one client-tool invocation. */
export interface ToolResult {
  exitCode: number;
  output: string;
}

export interface ToolTarget {
  endpoint: Endpoint;
  password: string;
  database: string;
  /** Pooler routing hint, passed as PGOPTIONS. */
  projectRef?: string;
}

export interface DumpOptions {
  table: TableRef;
}

export interface IPgTools {
  /** Runs an SQL script; with stopOnError the tool aborts on the first error. */
  runScript(target: ToolTarget, sql: string, opts?: { stopOnError?: boolean }): Promise<ToolResult>;
  /** Plain-text INSERT dump of one table's rows; the dump text is returned in `output` on success. */
  dump(target: ToolTarget, opts: DumpOptions): Promise<ToolResult>;
  /** Custom-format dump of the whole database written to `file`. */
  backup(target: ToolTarget, file: string): Promise<ToolResult>;
  isAvailable(tool: 'psql' | 'pg_dump'): Promise<boolean>;
}

export interface IManagementApi {
  resolveHost(projectRef: string, token: string): Promise<string>;
}
