import { execa } from 'execa';
import { TableRef } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { qualify } from '../../utils/sql.js';
import { DumpOptions, IPgTools, ToolResult, ToolTarget } from '../interfaces.js';

/**
 * Thin wrapper around the PostgreSQL client tools. Every call captures the
 * tool's output instead of throwing, because the exit code alone is not a
 * reliable success signal; callers classify the output.
 */
export class PgTools implements IPgTools {
  private availability = new Map<string, boolean>();

  async runScript(target: ToolTarget, sql: string, opts: { stopOnError?: boolean } = {}): Promise<ToolResult> {
    const args = [
      ...this.connectionArgs(target),
      '--no-psqlrc',
      '--quiet',
      '-v',
      `ON_ERROR_STOP=${opts.stopOnError === false ? '0' : '1'}`,
      '-f',
      '-',
    ];

    const start = Date.now();
    const result = await execa('psql', args, {
      env: this.env(target),
      input: sql,
      reject: false,
      all: true,
    });

    logger.debug(
      { tool: 'psql', endpoint: target.endpoint.label, exitCode: result.exitCode, duration: Date.now() - start },
      'Client tool finished'
    );
    return { exitCode: result.exitCode ?? 1, output: result.all ?? '' };
  }

  async dump(target: ToolTarget, opts: DumpOptions): Promise<ToolResult> {
    const args = [
      ...this.connectionArgs(target),
      '--data-only',
      '--column-inserts',
      '--no-owner',
      '--no-privileges',
      `--table=${this.tablePattern(opts.table)}`,
    ];

    const result = await execa('pg_dump', args, {
      env: this.env(target),
      reject: false,
    });

    logger.debug(
      { tool: 'pg_dump', endpoint: target.endpoint.label, table: this.tablePattern(opts.table), exitCode: result.exitCode },
      'Client tool finished'
    );
    const exitCode = result.exitCode ?? 1;
    return { exitCode, output: exitCode === 0 ? result.stdout : result.stderr || result.message };
  }

  async backup(target: ToolTarget, file: string): Promise<ToolResult> {
    const args = [...this.connectionArgs(target), '--format=custom', '--no-owner', '--no-privileges', `--file=${file}`];

    const start = Date.now();
    const result = await execa('pg_dump', args, {
      env: this.env(target),
      reject: false,
    });

    logger.debug(
      { tool: 'pg_dump', endpoint: target.endpoint.label, file, exitCode: result.exitCode, duration: Date.now() - start },
      'Client tool finished'
    );
    const exitCode = result.exitCode ?? 1;
    return { exitCode, output: exitCode === 0 ? file : result.stderr || result.message };
  }

  async isAvailable(tool: 'psql' | 'pg_dump'): Promise<boolean> {
    const cached = this.availability.get(tool);
    if (cached !== undefined) return cached;

    const result = await execa(tool, ['--version'], { reject: false });
    const available = result.exitCode === 0;
    if (!available) logger.warn(`${tool} is not available on PATH`);
    this.availability.set(tool, available);
    return available;
  }

  private connectionArgs(target: ToolTarget): string[] {
    return [
      '--host',
      target.endpoint.host,
      '--port',
      target.endpoint.port.toString(),
      '--username',
      target.endpoint.user,
      '--dbname',
      target.database,
    ];
  }

  private env(target: ToolTarget): Record<string, string | undefined> {
    return {
      ...process.env,
      PGPASSWORD: target.password,
      PGSSLMODE: 'require',
      PGOPTIONS: target.projectRef && target.endpoint.kind !== 'direct' ? `-c project=${target.projectRef}` : process.env.PGOPTIONS,
    };
  }

  // quoted so the pattern matches the exact, case-sensitive name
  private tablePattern(table: TableRef): string {
    return qualify(table.schema, table.name);
  }
}
