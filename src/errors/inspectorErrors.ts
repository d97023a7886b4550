import type { ResourceKind } from '../types/k8s';

export type InspectorErrorCode =
  | 'ConnectivityError'
  | 'AuthError'
  | 'FetchTimeoutError'
  | 'PartialDataError'
  | 'RuleEvaluationSkip'
  | 'ValidationUnavailable'
  | 'ApplyError';

export abstract class InspectorError extends Error {
  abstract readonly code: InspectorErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Cannot reach the API server at all
export class ConnectivityError extends InspectorError {
  readonly code = 'ConnectivityError';
}

// Credentials rejected by the API server
export class AuthError extends InspectorError {
  readonly code = 'AuthError';
}

export class FetchTimeoutError extends InspectorError {
  readonly code = 'FetchTimeoutError';

  constructor(
    readonly label: string,
    readonly timeoutMs: number
  ) {
    super(`Timed out after ${timeoutMs}ms while listing ${label}`);
  }
}

// One listing failed while the others succeeded
export class PartialDataError extends InspectorError {
  readonly code = 'PartialDataError';

  constructor(
    readonly kind: ResourceKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Thrown by a rule that cannot evaluate an incomplete record. The evaluator
 * catches it and moves on to the next rule or resource.
 */
export class RuleEvaluationSkip extends InspectorError {
  readonly code = 'RuleEvaluationSkip';

  constructor(readonly field: string) {
    super(`missing field "${field}"`);
  }
}

export class ValidationUnavailableError extends InspectorError {
  readonly code = 'ValidationUnavailable';
}

export class ApplyError extends InspectorError {
  readonly code = 'ApplyError';

  constructor(
    message: string,
    readonly output: string
  ) {
    super(message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
