import dayjs from 'dayjs';
import fs from 'fs-extra';
import path from 'path';
import { toSql } from '../core/planner.js';
import { MigrationPlan } from '../types/plan.js';
import { logger } from '../utils/logger.js';

export type MigrationKind = 'migration' | 'plan';

/** Default artifact directory: backups/<kind>_<source>_to_<target>_<timestamp>. */
export function defaultMigrationDir(kind: MigrationKind, sourceEnv: string, targetEnv: string, baseDir: string = process.cwd()): string {
  const timestamp = dayjs().format('YYYYMMDD_HHmmss');
  return path.join(baseDir, 'backups', `${kind}_${sourceEnv}_to_${targetEnv}_${timestamp}`);
}

export interface PlanArtifacts {
  sqlPath: string;
  jsonPath: string;
}

export class PlanWriter {
  constructor(private outputDir: string) {}

  async write(plan: MigrationPlan, sourceEnv: string, targetEnv: string): Promise<PlanArtifacts> {
    await fs.ensureDir(this.outputDir);
    const now = dayjs();
    const sqlPath = path.join(this.outputDir, `plan_${now.format('YYYYMMDD_HHmmss')}.sql`);
    const jsonPath = path.join(this.outputDir, 'plan.json');

    const header = [
      `-- Reconciliation plan: ${sourceEnv} -> ${targetEnv}`,
      `-- Date: ${now.format('YYYY-MM-DD HH:mm:ss')}`,
      `-- Mode: ${plan.mode.scope}, ${plan.mode.data}`,
      `-- Operations: ${plan.operations.length}${plan.destructive ? ' (destructive)' : ''}`,
      `-- --------------------------------------------------`,
      '',
    ].join('\n');

    await fs.writeFile(sqlPath, header + '\n' + toSql(plan), 'utf8');
    await fs.writeJson(jsonPath, { sourceEnv, targetEnv, generatedAt: now.toISOString(), ...plan }, { spaces: 2 });

    logger.info(`Plan written to ${sqlPath}`);
    return { sqlPath, jsonPath };
  }

  getOutputDir(): string {
    return this.outputDir;
  }
}
