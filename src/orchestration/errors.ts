import type { ErrorCode } from '../types';

export interface OrchestrationErrorOptions {
  remediation?: string;
  cause?: unknown;
}

export class OrchestrationError extends Error {
  readonly code: ErrorCode;
  readonly remediation?: string;

  constructor(code: ErrorCode, message: string, options: OrchestrationErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.remediation = options.remediation;
  }
}

export class PreconditionError extends OrchestrationError {
  constructor(message: string, options?: OrchestrationErrorOptions) {
    super('PRECONDITION_FAILED', message, options);
  }
}

export class ApplyError extends OrchestrationError {
  constructor(message: string, options?: OrchestrationErrorOptions) {
    super('APPLY_FAILED', message, options);
  }
}

export class UserAbortedError extends OrchestrationError {
  constructor(message = 'Operation declined by the operator', options?: OrchestrationErrorOptions) {
    super('USER_ABORTED', message, options);
  }
}

/**
 * Aborts polling and apply retries immediately. Raised for conditions that
 * waiting cannot fix, such as revoked authorization.
 */
export class FatalError extends OrchestrationError {
  constructor(message: string, options?: OrchestrationErrorOptions) {
    super('FATAL', message, options);
  }
}

export class ConfigError extends OrchestrationError {
  constructor(message: string, options?: OrchestrationErrorOptions) {
    super('CONFIG_INVALID', message, options);
  }
}

export class CommandError extends OrchestrationError {
  readonly command: string;
  readonly exitCode: number;
  readonly stderr: string;

  constructor(command: string, exitCode: number, stderr: string, options?: OrchestrationErrorOptions) {
    const reason = stderr.trim().split('\n').filter(Boolean).pop() ?? 'no output';
    super('COMMAND_FAILED', `${command} exited with code ${exitCode}: ${reason}`, options);
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export function isFatal(error: unknown): boolean {
  return error instanceof FatalError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function errorCodeOf(error: unknown, fallback: ErrorCode): ErrorCode {
  return error instanceof OrchestrationError ? error.code : fallback;
}

export function remediationOf(error: unknown): string | undefined {
  return error instanceof OrchestrationError ? error.remediation : undefined;
}
