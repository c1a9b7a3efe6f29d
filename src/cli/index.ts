#!/usr/bin/env node
import Table from 'cli-table3';
import { Command } from 'commander';
import fs from 'fs-extra';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { loadEnvironment } from '../config/environments.js';
import { buildReconciliationConfig, ReconcileOptions } from '../config/reconcile-config.js';
import { Reconciler } from '../core/orchestrator.js';
import { DriftReport } from '../types/comparison.js';
import { MigrationPlan } from '../types/plan.js';
import { DriftExporter } from '../utils/exporter.js';
import { logger } from '../utils/logger.js';

const migrateFlagsSchema = z.object({
  data: z.boolean().optional(),
  replaceData: z.boolean().optional(),
  users: z.boolean().optional(),
  schemaOnly: z.boolean().optional(),
  dataOnly: z.boolean().optional(),
  autoConfirm: z.boolean().optional(),
  dryRun: z.boolean().optional(),
  backup: z.boolean().optional(),
  tables: z.string().optional(),
  excludeSchemas: z.string().optional(),
  timeout: z.string().regex(/^\d+$/, 'timeout must be a number of milliseconds').optional(),
});

const verifyFlagsSchema = z.object({
  tables: z.string().optional(),
  excludeSchemas: z.string().optional(),
  output: z.union([z.string(), z.boolean()]).optional(),
});

function toOptions(flags: z.infer<typeof migrateFlagsSchema>, migrationDir?: string): ReconcileOptions {
  const { timeout, ...rest } = flags;
  return { ...rest, migrationDir, connectTimeoutMs: timeout ? Number(timeout) : undefined };
}

function reconcilerFor(sourceEnv: string, targetEnv: string, options: ReconcileOptions): Reconciler {
  const config = buildReconciliationConfig(options);
  return new Reconciler(loadEnvironment(sourceEnv), loadEnvironment(targetEnv), config);
}

export function printPlan(plan: MigrationPlan) {
  if (plan.operations.length === 0) {
    console.log('\n✅ Target already matches source. Nothing to apply.');
    return;
  }

  console.log(`\n📋 ${plan.operations.length} operations (${plan.summary.added} added, ${plan.summary.removed} removed, ${plan.summary.changed} changed):\n`);
  const table = new Table({
    head: ['Phase', 'Operation', 'Object', 'Destructive'],
    colWidths: [12, 22, 60, 13],
    wordWrap: true,
  });
  plan.operations.forEach(op => {
    table.push([op.phase, op.kind.replace(/_/g, ' '), op.targetObject, op.destructive ? 'yes' : '-']);
  });
  console.log(table.toString());

  if (plan.suppressed.length > 0) {
    console.log(`\n${plan.suppressed.length} removal(s) suppressed; rerun with --replace-data to apply them.`);
  }
}

export function printDrift(report: DriftReport) {
  if (report.clean) {
    console.log(`\n✅ No drift between ${report.sourceEnv} and ${report.targetEnv}.`);
  } else {
    console.log(`\n❌ Found ${report.items.length} differences:\n`);
    const table = new Table({
      head: ['Category', 'Change', 'Object', 'Details'],
      colWidths: [15, 20, 50, 60],
      wordWrap: true,
    });
    report.items.forEach(item => {
      table.push([item.category, item.change.replace(/_/g, ' '), item.name, item.details || '-']);
    });
    console.log(table.toString());
  }

  if (report.rowCounts.length > 0) {
    const counts = new Table({ head: ['Table', report.sourceEnv, report.targetEnv] });
    report.rowCounts.forEach(row => counts.push([row.table, row.source, row.target]));
    console.log(counts.toString());
  }

  console.log(`Expected exclusions (managed schemas): ${report.expectedExclusions.join(', ')}`);
}

function fail(error: unknown): never {
  if (error instanceof z.ZodError) {
    logger.error({ errors: error.issues }, 'Invalid configuration');
  } else {
    logger.error(error, 'Error during execution');
  }
  process.exit(1);
}

export async function runCli(argv: string[] = process.argv) {
  const program = new Command();

  program
    .name('reconcile')
    .description('Reconcile schema, policies and data between two Postgres environments')
    .version('1.0.0');

  program
    .command('migrate')
    .description('Bring the target environment in line with the source')
    .argument('<sourceEnv>', 'Source environment (prod, test, dev or a custom name)')
    .argument('<targetEnv>', 'Target environment')
    .argument('[migrationDir]', 'Directory for plan artifacts')
    .option('--data', 'Also copy table rows (incremental)')
    .option('--replace-data', 'Truncate target tables and reload them; allows removals')
    .option('--users', 'Also copy auth users and identities')
    .option('--schema-only', 'Only reconcile schema, policies and grants')
    .option('--data-only', 'Only copy rows')
    .option('--auto-confirm', 'Apply destructive plans without asking')
    .option('--dry-run', 'Write the plan without applying it')
    .option('--backup', 'Dump the whole target database into the migration directory first')
    .option('-t, --tables <list>', 'Comma separated list of tables to copy')
    .option('--exclude-schemas <list>', 'Extra schemas to leave alone')
    .option('--timeout <ms>', 'Connect timeout per endpoint')
    .action(async (sourceEnv: string, targetEnv: string, migrationDir: string | undefined, flags: unknown) => {
      try {
        const options = toOptions(migrateFlagsSchema.parse(flags), migrationDir);
        const result = await reconcilerFor(sourceEnv, targetEnv, options).run();

        printPlan(result.plan);
        if (result.drift) printDrift(result.drift);
        if (result.pendingBackfill.length > 0) {
          console.log(`\n⚠️  Left nullable, backfill required: ${result.pendingBackfill.join(', ')}`);
        }
        if (result.backupPath) console.log(`\nTarget backup: ${result.backupPath}`);
        console.log(`\nPlan artifacts: ${result.artifacts.sqlPath}`);
      } catch (error) {
        fail(error);
      }
    });

  program
    .command('plan')
    .description('Compute and write the plan without applying it')
    .argument('<sourceEnv>', 'Source environment')
    .argument('<targetEnv>', 'Target environment')
    .argument('[migrationDir]', 'Directory for plan artifacts')
    .option('--data', 'Include data operations')
    .option('--replace-data', 'Plan with replace semantics')
    .option('--users', 'Include auth users and identities')
    .option('--schema-only', 'Only schema, policies and grants')
    .option('--data-only', 'Only data operations')
    .option('-t, --tables <list>', 'Comma separated list of tables to copy')
    .option('--exclude-schemas <list>', 'Extra schemas to leave alone')
    .option('--timeout <ms>', 'Connect timeout per endpoint')
    .action(async (sourceEnv: string, targetEnv: string, migrationDir: string | undefined, flags: unknown) => {
      try {
        const options = toOptions(migrateFlagsSchema.parse(flags), migrationDir);
        const { plan, artifacts } = await reconcilerFor(sourceEnv, targetEnv, options).plan();
        printPlan(plan);
        console.log(`\nPlan written to ${artifacts.sqlPath}`);
      } catch (error) {
        fail(error);
      }
    });

  program
    .command('verify')
    .description('Report remaining differences between two environments')
    .argument('<sourceEnv>', 'Source environment')
    .argument('<targetEnv>', 'Target environment')
    .option('-t, --tables <list>', 'Tables whose row counts are compared')
    .option('--exclude-schemas <list>', 'Extra schemas to leave alone')
    .option('-o, --output [path]', 'Export the report (e.g. drift.xlsx or drift.csv)')
    .action(async (sourceEnv: string, targetEnv: string, flags: unknown) => {
      try {
        const { output, ...options } = verifyFlagsSchema.parse(flags);
        const report = await reconcilerFor(sourceEnv, targetEnv, options).verify();
        printDrift(report);

        if (output === true) {
          const defaultPath = path.join(process.cwd(), 'files', 'drift', `drift_${sourceEnv}_vs_${targetEnv}.xlsx`);
          await DriftExporter.exportToSheet(report, defaultPath);
        } else if (output) {
          const outputPath = path.isAbsolute(output) ? output : path.join(process.cwd(), 'files', 'drift', output);
          await DriftExporter.exportToSheet(report, outputPath);
        }
      } catch (error) {
        fail(error);
      }
    });

  await program.parseAsync(argv);
}

function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  const self = fileURLToPath(import.meta.url);
  // the npm bin is a symlink to this file
  return self === path.resolve(entry) || (fs.existsSync(entry) && self === fs.realpathSync(entry));
}

if (invokedDirectly()) {
  runCli().catch(fail);
}
