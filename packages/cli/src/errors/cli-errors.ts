/**
 * CLI-specific error classes
 */

/**
 * Base CLI error class
 */
export class CliError extends Error {
  constructor(
    message: string,
    public readonly suggestion?: string,
    public readonly exitCode: number = 1,
  ) {
    super(message);
    this.name = 'CliError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    const lines = [`Error: ${this.message}`];
    if (this.suggestion) {
      lines.push('');
      lines.push(`Suggestion: ${this.suggestion}`);
    }
    return lines.join('\n');
  }
}

/**
 * Configuration error
 */
export class ConfigError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion);
    this.name = 'ConfigError';
  }
}

/**
 * Bad command-line input (FEN, depth, square)
 */
export class InputError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion, 2);
    this.name = 'InputError';
  }
}

/**
 * Engine could not be used for a command that needs it
 */
export class EngineServiceError extends CliError {
  constructor(
    public readonly enginePath: string,
    message: string,
    suggestion?: string,
  ) {
    super(message, suggestion, 3);
    this.name = 'EngineServiceError';
  }

  override format(): string {
    const lines = [`Error [${this.enginePath}]: ${this.message}`];
    if (this.suggestion) {
      lines.push('');
      lines.push(`Suggestion: ${this.suggestion}`);
    }
    return lines.join('\n');
  }
}
