import { EventEmitter } from 'events';

import { v4 as uuidv4 } from 'uuid';

import { filterAlerts } from '../../reporters/AlertReporter';
import { QuickScanPlan } from '../../types/config';
import { RunState, ScanStage } from '../../types/enums';
import { RunOutcome } from '../../types/run';
import { Logger } from '../../utils/logger/Logger';
import { ReadinessPoller } from '../daemon/ReadinessPoller';
import { RemoteOperationError, ZapCliError, getErrorMessage } from '../errors';
import { IScanClient } from '../interfaces/IScanClient';

/** State each stage runs in */
const STAGE_STATES: Record<ScanStage, RunState> = {
  [ScanStage.START_DAEMON]: RunState.STARTING,
  [ScanStage.CONFIGURE_SCANNERS]: RunState.CONFIGURING,
  [ScanStage.APPLY_EXCLUSION]: RunState.CONFIGURING,
  [ScanStage.OPEN_TARGET]: RunState.TARGET_OPEN,
  [ScanStage.PASSIVE_CRAWL]: RunState.CRAWLING,
  [ScanStage.ACTIVE_CONTENT_CRAWL]: RunState.CRAWLING,
  [ScanStage.ACTIVE_SCAN]: RunState.ACTIVE_SCANNING,
  [ScanStage.COLLECT_ALERTS]: RunState.COLLECTING,
  [ScanStage.SHUTDOWN_DAEMON]: RunState.SHUTTING_DOWN,
};

/**
 * Stages a plan will run, in execution order
 */
export function plannedStages(plan: QuickScanPlan): ScanStage[] {
  const stages: ScanStage[] = [];
  if (plan.selfContained) stages.push(ScanStage.START_DAEMON);
  if (plan.scannerIds) stages.push(ScanStage.CONFIGURE_SCANNERS);
  if (plan.exclude !== undefined) stages.push(ScanStage.APPLY_EXCLUSION);
  stages.push(ScanStage.OPEN_TARGET);
  if (plan.spider) stages.push(ScanStage.PASSIVE_CRAWL);
  if (plan.ajaxSpider) stages.push(ScanStage.ACTIVE_CONTENT_CRAWL);
  stages.push(ScanStage.ACTIVE_SCAN, ScanStage.COLLECT_ALERTS);
  if (plan.selfContained) stages.push(ScanStage.SHUTDOWN_DAEMON);
  return stages;
}

/**
 * ScanOrchestrator - runs the quick-scan workflow against a scan client.
 *
 * Stages run one at a time in a fixed order and the first failure stops the
 * rest. A daemon started by the run is always shut down again, whatever
 * happened before.
 *
 * Events: `state` (RunState), `stage:start` / `stage:complete` (ScanStage),
 * `stage:failed` (ScanStage, Error).
 */
export class ScanOrchestrator extends EventEmitter {
  private readonly logger: Logger;

  constructor(
    private readonly client: IScanClient,
    private readonly poller: ReadinessPoller,
    logger?: Logger
  ) {
    super();
    this.logger = logger ?? new Logger({ prefix: 'ScanOrchestrator' });
  }

  async runQuickScan(plan: QuickScanPlan): Promise<RunOutcome> {
    const outcome: RunOutcome = {
      runId: uuidv4(),
      target: plan.target,
      state: RunState.IDLE,
      requestedStages: plannedStages(plan),
      completedStages: [],
      alerts: [],
      softFail: plan.softFail,
    };

    this.logger.info(`Running a quick scan for ${plan.target}`);
    this.logger.debug(`Run ${outcome.runId}: ${outcome.requestedStages.join(' -> ')}`);

    try {
      await this.withDaemon(plan, outcome, async () => {
        if (plan.scannerIds) {
          const ids = plan.scannerIds;
          await this.stage(outcome, ScanStage.CONFIGURE_SCANNERS, () => this.client.setEnabledScanners(ids));
        }
        if (plan.exclude !== undefined) {
          const pattern = plan.exclude;
          await this.stage(outcome, ScanStage.APPLY_EXCLUSION, () => this.client.applyExclusion(pattern));
        }

        await this.stage(outcome, ScanStage.OPEN_TARGET, () => this.client.openTarget(plan.target));

        if (plan.spider) {
          await this.stage(outcome, ScanStage.PASSIVE_CRAWL, () =>
            this.client.runPassiveCrawl(plan.target, plan.identity)
          );
        }
        if (plan.ajaxSpider) {
          await this.stage(outcome, ScanStage.ACTIVE_CONTENT_CRAWL, () =>
            this.client.runActiveContentCrawl(plan.target)
          );
        }

        await this.stage(outcome, ScanStage.ACTIVE_SCAN, () =>
          this.client.runActiveScan(plan.target, plan.recursive, plan.identity)
        );

        await this.stage(outcome, ScanStage.COLLECT_ALERTS, async () => {
          const alerts = await this.client.listAlerts(plan.minRisk);
          outcome.alerts = filterAlerts(alerts, plan.minRisk);
        });
      });
    } catch (error) {
      outcome.error = error instanceof Error ? error : new Error(String(error));
      this.transition(outcome, RunState.FAILED);
      return outcome;
    }

    this.transition(outcome, RunState.DONE);
    return outcome;
  }

  /**
   * Start the daemon when the plan is self-contained, run the body, and
   * always attempt shutdown afterwards. A shutdown failure is recorded on the
   * outcome; it never replaces the body's result.
   */
  private async withDaemon(plan: QuickScanPlan, outcome: RunOutcome, body: () => Promise<void>): Promise<void> {
    if (!plan.selfContained) {
      await body();
      return;
    }

    try {
      await this.stage(outcome, ScanStage.START_DAEMON, async () => {
        this.logger.info('Starting ZAP daemon');
        await this.client.start(plan.startOptions);
        await this.poller.waitUntilReady(plan.startupTimeout);
      });
      await body();
    } finally {
      await this.releaseDaemon(outcome);
    }
  }

  private async releaseDaemon(outcome: RunOutcome): Promise<void> {
    this.logger.info('Shutting down ZAP daemon');
    try {
      await this.stage(outcome, ScanStage.SHUTDOWN_DAEMON, () => this.client.shutdown());
    } catch (error) {
      outcome.shutdownError = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Failed to shut down ZAP daemon: ${getErrorMessage(error)}`);
    }
  }

  private async stage(outcome: RunOutcome, stage: ScanStage, run: () => Promise<void>): Promise<void> {
    this.transition(outcome, STAGE_STATES[stage]);
    this.emit('stage:start', stage);
    try {
      await run();
    } catch (error) {
      const failure = wrapStageError(stage, error);
      this.logger.debug(`Stage ${stage} failed: ${failure.message}`);
      this.emit('stage:failed', stage, failure);
      throw failure;
    }
    outcome.completedStages.push(stage);
    this.emit('stage:complete', stage);
  }

  private transition(outcome: RunOutcome, state: RunState): void {
    if (outcome.state === state) return;
    outcome.state = state;
    this.emit('state', state);
  }
}

/**
 * CLI errors (timeouts, not running) keep their kind; anything else from the
 * client becomes a RemoteOperationError naming the stage
 */
function wrapStageError(stage: ScanStage, error: unknown): ZapCliError {
  if (error instanceof RemoteOperationError && error.stage === undefined) {
    return new RemoteOperationError(error.operation, error.message, { cause: error.cause, stage });
  }
  if (error instanceof ZapCliError) {
    return error;
  }
  return new RemoteOperationError(stage, `${stage} failed: ${getErrorMessage(error)}`, { cause: error, stage });
}
