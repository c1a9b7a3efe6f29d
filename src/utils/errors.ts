import { Endpoint } from '../types/index.js';

export type Stage =
  | 'configuration'
  | 'connect'
  | 'introspection'
  | 'planning'
  | 'execution'
  | 'data-sync'
  | 'verification';

export class ReconcileError extends Error {
  constructor(
    public readonly stage: Stage,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ReconcileError';
  }
}

export type ConnectFailureReason = 'dns' | 'auth' | 'timeout' | 'refused' | 'tls' | 'unknown';

export interface ConnectAttempt {
  endpoint: Endpoint;
  reason: ConnectFailureReason;
  message: string;
}

export class ConnectFailure extends ReconcileError {
  constructor(
    public readonly environment: string,
    public readonly attempts: ConnectAttempt[]
  ) {
    const tried = attempts.map(a => `${a.endpoint.label} (${a.endpoint.host}:${a.endpoint.port}): ${a.reason}`);
    super(
      'connect',
      `No endpoint reachable for environment "${environment}"${tried.length ? `. Tried: ${tried.join('; ')}` : ''}`
    );
    this.name = 'ConnectFailure';
  }
}

export class ConfigurationError extends ReconcileError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('configuration', message, details);
    this.name = 'ConfigurationError';
  }
}

export class IntrospectionFailure extends ReconcileError {
  constructor(message: string, public readonly query?: string) {
    super('introspection', message);
    this.name = 'IntrospectionFailure';
  }
}

export class PlanGenerationFailure extends ReconcileError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('planning', message, details);
    this.name = 'PlanGenerationFailure';
  }
}

export class ExecutionFailure extends ReconcileError {
  constructor(
    public readonly kind: 'fatal' | 'unexpected',
    message: string,
    public readonly lastError: string,
    stage: Stage = 'execution'
  ) {
    super(stage, message);
    this.name = 'ExecutionFailure';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
