import { ComplianceValidationResult } from '../types';

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends Error {
  constructor(
    public readonly entity: string,
    public readonly entityId: string,
  ) {
    super(`${entity} not found: ${entityId}`);
    this.name = 'NotFoundError';
  }
}

export class TimeoutError extends Error {
  readonly retryable = true;

  constructor(
    message: string,
    public readonly timeoutMs: number,
  ) {
    super(message);
    this.name = 'TimeoutError';
  }
}

export class CancelledError extends Error {
  constructor(message: string = 'Operation cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

export class ComplianceViolationError extends Error {
  constructor(
    message: string,
    public readonly result: ComplianceValidationResult,
  ) {
    super(message);
    this.name = 'ComplianceViolationError';
  }
}

export class UnsupportedCommandError extends Error {
  constructor(
    message: string,
    public readonly commandType?: string,
  ) {
    super(message);
    this.name = 'UnsupportedCommandError';
  }
}

export class LlmResponseError extends Error {
  constructor(
    message: string,
    public readonly rawResponse?: string,
  ) {
    super(message);
    this.name = 'LlmResponseError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
