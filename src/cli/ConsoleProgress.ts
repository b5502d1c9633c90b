import { EventEmitter } from 'events';

import ora from 'ora';

import { ScanStage } from '../types/enums';

const STAGE_LABELS: Record<ScanStage, string> = {
  [ScanStage.START_DAEMON]: 'Starting ZAP daemon',
  [ScanStage.CONFIGURE_SCANNERS]: 'Enabling scanners',
  [ScanStage.APPLY_EXCLUSION]: 'Applying exclusion',
  [ScanStage.OPEN_TARGET]: 'Opening target',
  [ScanStage.PASSIVE_CRAWL]: 'Running spider',
  [ScanStage.ACTIVE_CONTENT_CRAWL]: 'Running AJAX Spider',
  [ScanStage.ACTIVE_SCAN]: 'Running active scan',
  [ScanStage.COLLECT_ALERTS]: 'Collecting alerts',
  [ScanStage.SHUTDOWN_DAEMON]: 'Shutting down ZAP daemon',
};

/**
 * Spinner that follows the orchestrator's stage events
 */
export class ConsoleProgress {
  private spinner: ora.Ora;

  constructor(stream: NodeJS.WritableStream, enabled: boolean) {
    this.spinner = ora({ spinner: 'dots', stream, isEnabled: enabled, isSilent: !enabled, discardStdin: false });
  }

  attach(source: EventEmitter): void {
    source.on('stage:start', (stage: ScanStage) => {
      this.spinner.start(STAGE_LABELS[stage]);
    });
    source.on('stage:complete', (stage: ScanStage) => {
      this.spinner.succeed(STAGE_LABELS[stage]);
    });
    source.on('stage:failed', (stage: ScanStage) => {
      this.spinner.fail(STAGE_LABELS[stage]);
    });
  }

  stop(): void {
    this.spinner.stop();
  }
}
