import { Logger } from '../../utils/logger/Logger';
import { sleep } from '../../utils/helpers/common-helpers';
import { NotRunningError, TimeoutError } from '../errors';

/**
 * Time source used for deadlines and pauses; swapped for a fake in tests
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};

export interface ReadinessPollerOptions {
  /** Pause between probes (ms) */
  intervalMs?: number;
  clock?: Clock;
  logger?: Logger;
}

export const DEFAULT_POLL_INTERVAL_MS = 1000;

/**
 * Repeatedly probes the daemon until it reaches the wanted state or a deadline passes
 */
export class ReadinessPoller {
  private readonly intervalMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(
    private readonly probe: () => Promise<boolean>,
    options: ReadinessPollerOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? new Logger({ prefix: 'ReadinessPoller' });
  }

  /**
   * Resolve once the daemon answers.
   *
   * Without a timeout a single failed probe rejects with NotRunningError;
   * with one, probing repeats until the deadline and then rejects with TimeoutError.
   */
  async waitUntilReady(timeoutSeconds?: number): Promise<void> {
    if (await this.probe()) return;

    if (timeoutSeconds === undefined) {
      throw new NotRunningError();
    }

    this.logger.debug(`Waiting up to ${timeoutSeconds}s for ZAP to start`);
    await this.pollUntil(true, timeoutSeconds, 'Timed out waiting for ZAP to start');
  }

  /**
   * Resolve once the daemon stops answering
   */
  async waitUntilStopped(timeoutSeconds: number): Promise<void> {
    if (!(await this.probe())) return;

    this.logger.debug(`Waiting up to ${timeoutSeconds}s for ZAP to stop`);
    await this.pollUntil(false, timeoutSeconds, 'Timed out waiting for ZAP to shut down');
  }

  private async pollUntil(expected: boolean, timeoutSeconds: number, timeoutMessage: string): Promise<void> {
    const deadline = this.clock.now() + timeoutSeconds * 1000;

    for (;;) {
      const remaining = deadline - this.clock.now();
      if (remaining <= 0) {
        throw new TimeoutError(timeoutMessage, timeoutSeconds);
      }

      await this.clock.sleep(Math.min(this.intervalMs, remaining));

      if ((await this.probe()) === expected) return;
    }
  }
}
