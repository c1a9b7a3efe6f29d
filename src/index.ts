export { loadEnvironment, envPrefix } from './config/environments.js';
export { buildReconciliationConfig, resolveSyncMode } from './config/reconcile-config.js';
export type { ReconcileOptions } from './config/reconcile-config.js';
export { OutputClassifier, DEFAULT_RULES } from './core/classifier.js';
export type { ClassificationRule } from './core/classifier.js';
export { SchemaComparator, countDiff, isEmptyDiff } from './core/comparator.js';
export { DataSyncEngine } from './core/data-sync.js';
export { ExecutionEngine } from './core/executor.js';
export { Reconciler } from './core/orchestrator.js';
export type { ReconcileResult, ReconcilerDeps } from './core/orchestrator.js';
export { PlanGenerator, toSql } from './core/planner.js';
export { toConflictTolerant } from './core/upsert.js';
export { Verifier } from './core/verifier.js';
export { ConnectionResolver } from './db/resolver.js';
export { ManagementApiClient } from './db/management-api.js';
export { PostgresInspector } from './engines/postgres/PostgresInspector.js';
export { PgTools } from './engines/postgres/PgTools.js';
export * from './types/index.js';
export * from './types/comparison.js';
export * from './types/plan.js';
export * from './utils/errors.js';
