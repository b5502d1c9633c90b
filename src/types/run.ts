import { Alert } from './alert';
import { RunState, ScanStage } from './enums';

/**
 * State of one quick scan invocation
 */
export interface RunOutcome {
  /** Unique identifier for this run */
  runId: string;

  /** Target URL */
  target: string;

  /** Current (or final) state */
  state: RunState;

  /** Stages the plan asked for, in execution order */
  requestedStages: ScanStage[];

  /** Stages that finished without error */
  completedStages: ScanStage[];

  /** Alerts at or above the requested risk */
  alerts: readonly Alert[];

  /** Per-command soft-fail flag */
  softFail: boolean;

  /** First failure, when state is FAILED */
  error?: Error;

  /** Failure while releasing a self-started daemon */
  shutdownError?: Error;
}
