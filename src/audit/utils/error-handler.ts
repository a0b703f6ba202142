/**
 * Audit error handling
 * Typed errors for the MAAS query path and their mapping to exit codes
 */

import { AuditLogger, createModuleLogger } from './logger';

export enum AuditErrorType {
  /** maas CLI could not be started, exited non-zero or timed out */
  MAAS_COMMAND_ERROR = 'maas_command_error',

  /** maas CLI output was not the expected JSON */
  OUTPUT_PARSING_ERROR = 'output_parsing_error',

  /** Invalid configuration file or environment value */
  CONFIGURATION_ERROR = 'configuration_error',

  UNKNOWN_ERROR = 'unknown_error'
}

export interface AuditErrorContext {
  errorType: AuditErrorType;

  /** MAAS profile the report was run against */
  profile?: string;

  /** Command line that failed */
  command?: string;

  timestamp: Date;

  details?: Record<string, unknown>;
}

export class AuditError extends Error {
  public readonly context: AuditErrorContext;

  constructor(
    message: string,
    errorType: AuditErrorType,
    context: Omit<Partial<AuditErrorContext>, 'errorType' | 'timestamp'> = {}
  ) {
    super(message);
    this.name = 'AuditError';
    this.context = {
      ...context,
      errorType,
      timestamp: new Date()
    };
  }

  toString(): string {
    return `[${this.context.errorType}] ${this.message}`;
  }
}

export class AuditErrorHandler {
  private logger: AuditLogger;

  constructor(logger?: AuditLogger) {
    this.logger = logger || createModuleLogger('error-handler');
  }

  /**
   * Log the error and return the exit code the CLI should terminate with.
   * Expected failures are logged at debug; the CLI prints their message itself.
   */
  handleError(error: unknown): number {
    const normalized = this.normalize(error);
    const { context } = normalized;
    const logData = {
      errorType: context.errorType,
      profile: context.profile,
      command: context.command,
      details: context.details
    };

    switch (context.errorType) {
      case AuditErrorType.MAAS_COMMAND_ERROR:
        this.logger.debug(`MAAS command failed: ${normalized.message}`, logData);
        return 1;

      case AuditErrorType.OUTPUT_PARSING_ERROR:
        this.logger.debug(`Could not parse MAAS output: ${normalized.message}`, logData);
        return 1;

      case AuditErrorType.CONFIGURATION_ERROR:
        this.logger.debug(`Configuration error: ${normalized.message}`, logData);
        return 2;

      default:
        this.logger.fatal(`Unexpected error: ${normalized.message}`, normalized, logData);
        return 1;
    }
  }

  /**
   * Wrap anything thrown into an AuditError
   */
  normalize(error: unknown): AuditError {
    if (error instanceof AuditError) {
      return error;
    }

    if (error instanceof Error) {
      const wrapped = new AuditError(error.message, AuditErrorType.UNKNOWN_ERROR, {
        details: { originalName: error.name }
      });
      wrapped.stack = error.stack;
      return wrapped;
    }

    return new AuditError(String(error), AuditErrorType.UNKNOWN_ERROR);
  }
}

export const auditErrorHandler = new AuditErrorHandler();
