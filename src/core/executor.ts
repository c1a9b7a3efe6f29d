import { ConnectionResolver } from '../db/resolver.js';
import { IPgTools } from '../engines/interfaces.js';
import { DataMode, EnvironmentCredentials } from '../types/index.js';
import { ExecutionReport, MigrationPlan, Operation, OperationResult, Phase, PHASE_ORDER } from '../types/plan.js';
import { ConnectFailure, ExecutionFailure } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { OutputClassifier } from './classifier.js';
import { executionUnits, unitSql } from './planner.js';

export interface ApplyOptions {
  phases?: readonly Phase[];
  /** Extra predicate on top of the phase selection. */
  filter?: (op: Operation) => boolean;
  dryRun?: boolean;
}

export interface ScriptOptions {
  mode: DataMode;
  /** Abort the script on its first error; loads run to completion and are classified afterwards. */
  stopOnError?: boolean;
}

/**
 * Applies SQL to the target through the client tool, one execution unit at a
 * time. Fatal output moves on to the next endpoint, unexpected output aborts.
 */
export class ExecutionEngine {
  constructor(
    private resolver: ConnectionResolver,
    private tools: IPgTools,
    private classifier: OutputClassifier = new OutputClassifier()
  ) {}

  async apply(plan: MigrationPlan, target: EnvironmentCredentials, options: ApplyOptions = {}): Promise<ExecutionReport> {
    const started = Date.now();
    const phases = options.phases ?? PHASE_ORDER;
    const operations = plan.operations.filter(op => phases.includes(op.phase) && (options.filter?.(op) ?? true));
    const units = executionUnits(operations);

    const report: ExecutionReport = {
      success: true,
      dryRun: Boolean(options.dryRun),
      applied: 0,
      tolerated: 0,
      results: [],
      duration: 0,
    };

    if (units.length === 0) {
      logger.info({ phases }, 'No operations to apply');
      return report;
    }

    if (options.dryRun) {
      logger.info({ phases, units: units.length }, 'Dry run: skipping execution');
      report.duration = Date.now() - started;
      return report;
    }

    for (const unit of units) {
      const label = unit.length === 1 ? unit[0].targetObject : `${unit[0].group} (${unit.length} statements)`;
      const result = await this.execute(target, unitSql(unit), label, { mode: plan.mode.data, stopOnError: true });
      report.results.push(result);
      report.applied += unit.length;
      if (result.classification === 'tolerable') report.tolerated++;
    }

    report.duration = Date.now() - started;
    logger.info({ applied: report.applied, tolerated: report.tolerated, duration: report.duration }, `Applied ${phases.join(', ')}`);
    return report;
  }

  /** Runs one script against the target, falling back across endpoints on fatal output. */
  async execute(target: EnvironmentCredentials, sql: string, label: string, options: ScriptOptions): Promise<OperationResult> {
    try {
      return await this.resolver.withEndpoints<OperationResult>(target, `Applying ${label}`, async toolTarget => {
        const { exitCode, output } = await this.tools.runScript(toolTarget, sql, { stopOnError: options.stopOnError ?? true });
        const { classification, matched } = this.classifier.classify(output, exitCode, options.mode);

        switch (classification) {
          case 'fatal':
            return { ok: false, error: matched[0] ?? `exit code ${exitCode}` };
          case 'unexpected':
            logger.error({ target: label, output }, 'Unexpected error while applying SQL');
            throw new ExecutionFailure('unexpected', `Failed to apply ${label}: ${matched[0]}`, matched[0] ?? output);
          case 'tolerable':
            logger.warn({ target: label, tolerated: matched }, 'Applied with tolerated errors');
            break;
          case 'ok':
            logger.debug({ target: label }, 'Applied');
            break;
        }
        return {
          ok: true,
          value: { target: label, classification, endpoint: toolTarget.endpoint.label, output: output || undefined },
        };
      });
    } catch (error) {
      if (error instanceof ConnectFailure) {
        const last = error.attempts[error.attempts.length - 1];
        throw new ExecutionFailure('fatal', `All endpoints failed while applying ${label}`, last?.message ?? error.message);
      }
      throw error;
    }
  }
}
