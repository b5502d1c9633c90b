import { ScanStage } from '../../types/enums';

/**
 * Base class for every failure the CLI reports to the user
 */
export abstract class ZapCliError extends Error {
  abstract readonly kind: 'usage' | 'not-running' | 'timeout' | 'remote' | 'report';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Invalid option combination, scanner token or pattern; raised before any remote call
 */
export class UsageError extends ZapCliError {
  readonly kind = 'usage';
}

/**
 * The daemon did not answer and no wait was requested
 */
export class NotRunningError extends ZapCliError {
  readonly kind = 'not-running';

  constructor(message = 'ZAP is not running') {
    super(message);
  }
}

/**
 * The daemon did not reach the expected state before the deadline
 */
export class TimeoutError extends ZapCliError {
  readonly kind = 'timeout';
  public readonly timeout: number;

  constructor(message: string, timeoutSeconds: number) {
    super(`${message} (after ${timeoutSeconds}s)`);
    this.timeout = timeoutSeconds;
  }
}

/**
 * A call to the ZAP daemon failed
 */
export class RemoteOperationError extends ZapCliError {
  readonly kind = 'remote';
  public readonly operation: string;
  public readonly stage?: ScanStage;

  constructor(operation: string, message: string, options?: { cause?: unknown; stage?: ScanStage }) {
    super(message, { cause: options?.cause });
    this.operation = operation;
    this.stage = options?.stage;
  }
}

/**
 * A report could not be rendered or written
 */
export class ReportError extends ZapCliError {
  readonly kind = 'report';
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
