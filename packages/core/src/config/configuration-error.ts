/**
 * Configuration Error Class
 *
 * Raised when the stack configuration cannot be read, parsed or written.
 * Carries the offending file and a suggestion for the operator.
 */

export class ConfigurationError extends Error {
  public override readonly cause?: Error;

  constructor(
    message: string,
    public configPath?: string,
    public suggestion?: string,
    cause?: Error
  ) {
    super(message);
    this.name = 'ConfigurationError';
    this.cause = cause;
  }

  /**
   * Format the error nicely for CLI output
   */
  override toString(): string {
    let output = this.message;
    if (this.configPath) {
      output += `\n   File: ${this.configPath}`;
    }
    if (this.suggestion) {
      output += `\n   Suggestion: ${this.suggestion}`;
    }
    return output;
  }
}
