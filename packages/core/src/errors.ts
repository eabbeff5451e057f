/**
 * Error taxonomy for stack operations
 *
 * Orchestrators throw these for conditions that stop an operation before it
 * mutates anything. Partial failures are reported in results instead, and a
 * declined confirmation is a normal outcome rather than an error.
 */

import { ConfigurationError } from './config/configuration-error.js';

/**
 * Invalid input: conflicting flags, an unknown service, a malformed or
 * incomplete backup bundle.
 */
export class StackValidationError extends Error {
  constructor(
    message: string,
    public suggestion?: string,
    public details: string[] = []
  ) {
    super(message);
    this.name = 'StackValidationError';
  }

  override toString(): string {
    let output = this.message;
    for (const detail of this.details) {
      output += `\n   - ${detail}`;
    }
    if (this.suggestion) {
      output += `\n   Suggestion: ${this.suggestion}`;
    }
    return output;
  }
}

/**
 * The container engine daemon cannot be reached or its CLI is missing.
 */
export class EngineUnavailableError extends Error {
  public override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'EngineUnavailableError';
    this.cause = cause;
  }

  override toString(): string {
    return `${this.message}\n   Suggestion: Start Docker Desktop or the docker daemon, then retry.`;
  }
}

/**
 * Render any thrown value as operator-facing text. Known error types print
 * their message and suggestion; nothing prints a stack trace.
 */
export function formatErrorForCli(error: unknown): string {
  if (
    error instanceof ConfigurationError ||
    error instanceof StackValidationError ||
    error instanceof EngineUnavailableError
  ) {
    return error.toString();
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
