import { ExitCode } from '../../types/enums';
import { NotRunningError } from '../errors';

export interface AlertExitInput {
  /** Alerts at or above the requested risk */
  qualifyingAlerts: number;
  /** Per-command soft-fail flag */
  softFail: boolean;
  /** Process-wide soft-fail override (--soft-fail before the command, or SOFT_FAIL) */
  softFailOverride: boolean;
}

/**
 * Exit code for a command whose outcome is a set of alerts
 */
export function exitCodeForAlerts({ qualifyingAlerts, softFail, softFailOverride }: AlertExitInput): ExitCode {
  if (qualifyingAlerts === 0 || softFail || softFailOverride) {
    return ExitCode.SUCCESS;
  }
  return ExitCode.ALERTS_FOUND;
}

/**
 * Exit code for a failed command. Soft-fail never applies here.
 */
export function exitCodeForError(error: unknown): ExitCode {
  return error instanceof NotRunningError ? ExitCode.NOT_RUNNING : ExitCode.ERROR;
}
