/**
 * Error taxonomy for the research engine
 *
 * - transient: isolated to the unit that raised it, logged into history
 * - permanent: the collaborator will keep rejecting, fatal when raised by a required step
 */

import type { ModelSelection } from './config.js';

export type FailureKind = 'transient' | 'permanent';

export class LLMError extends Error {
  public readonly provider?: ModelSelection['provider'];
  public readonly cause?: unknown;

  constructor(
    message: string,
    public readonly model: string,
    public readonly kind: FailureKind,
    public readonly status?: number,
    details: { provider?: ModelSelection['provider']; cause?: unknown } = {}
  ) {
    super(message);
    this.name = 'LLMError';
    this.provider = details.provider;
    this.cause = details.cause;
  }
}

export type CollaboratorName = 'language-model' | 'academic-search' | 'document-structuring' | 'memory-cache';

export class CollaboratorUnavailableError extends Error {
  constructor(
    public readonly collaborator: CollaboratorName,
    message: string,
    public readonly cause?: unknown
  ) {
    super(`${collaborator} unavailable: ${message}`);
    this.name = 'CollaboratorUnavailableError';
  }
}

export class UnitTimeoutError extends Error {
  constructor(public readonly label: string, public readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'UnitTimeoutError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, public readonly path: string) {
    super(path ? `Invalid config at "${path}": ${message}` : `Invalid config: ${message}`);
    this.name = 'ConfigError';
  }
}

/**
 * HTTP status → failure kind. Auth, validation and not-found responses will not fix themselves.
 */
export function classifyHttpStatus(status: number): FailureKind {
  if (status === 400 || status === 401 || status === 403 || status === 404) {
    return 'permanent';
  }
  return 'transient';
}

export function isPermanentLLMError(error: unknown): error is LLMError {
  return error instanceof LLMError && error.kind === 'permanent';
}

export function isFatal(error: unknown): boolean {
  return error instanceof CollaboratorUnavailableError || isPermanentLLMError(error);
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
