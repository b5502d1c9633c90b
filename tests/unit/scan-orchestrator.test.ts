import { ReadinessPoller } from '@core/daemon/ReadinessPoller';
import { resolveQuickScanPlan } from '@core/engine/QuickScanPlan';
import { ScanOrchestrator, plannedStages } from '@core/engine/ScanOrchestrator';
import { RemoteOperationError, TimeoutError } from '@core/errors';

import { QuickScanInput, QuickScanPlan } from '../../src/types/config';
import { AlertRisk, RunState, ScanStage } from '../../src/types/enums';
import { Logger } from '../../src/utils/logger/Logger';
import { FakeClock, FakeScanClient, makeAlert } from '../helpers/fakes';

describe('ScanOrchestrator', () => {
  let client: FakeScanClient;
  let clock: FakeClock;
  let orchestrator: ScanOrchestrator;

  const plan = (input: Partial<QuickScanInput> = {}): QuickScanPlan =>
    resolveQuickScanPlan({ target: 'http://example.com', ...input });

  beforeEach(() => {
    client = new FakeScanClient();
    clock = new FakeClock();
    const logger = new Logger({ colorize: false });
    const poller = new ReadinessPoller(() => client.probeLiveness(), { clock, logger });
    orchestrator = new ScanOrchestrator(client, poller, logger);
  });

  it('should run every stage in order for a full plan', async () => {
    const outcome = await orchestrator.runQuickScan(
      plan({ selfContained: true, scanners: 'sqli', exclude: '.*logout.*', spider: true, ajaxSpider: true })
    );

    expect(outcome.state).toBe(RunState.DONE);
    expect(client.methods()).toEqual([
      'start',
      'probeLiveness',
      'setEnabledScanners',
      'applyExclusion',
      'openTarget',
      'runPassiveCrawl',
      'runActiveContentCrawl',
      'runActiveScan',
      'listAlerts',
      'shutdown',
    ]);
    expect(outcome.completedStages).toEqual(outcome.requestedStages);
  });

  it('should only open, scan and collect for a minimal plan', async () => {
    await orchestrator.runQuickScan(plan());
    expect(client.methods()).toEqual(['openTarget', 'runActiveScan', 'listAlerts']);
  });

  it('should keep only alerts at or above the threshold', async () => {
    client.alerts = [
      makeAlert({ id: '1', risk: AlertRisk.HIGH }),
      makeAlert({ id: '2', risk: AlertRisk.LOW }),
      makeAlert({ id: '3', risk: AlertRisk.HIGH }),
    ];

    const outcome = await orchestrator.runQuickScan(plan({ alertLevel: 'High' }));

    expect(outcome.alerts.map((a) => a.id)).toEqual(['1', '3']);
  });

  it('should pass recursion and identity to the active scan', async () => {
    await orchestrator.runQuickScan(plan({ recursive: true, contextName: 'app', userName: 'alice' }));

    const scan = client.calls.find((c) => c.method === 'runActiveScan');
    expect(scan?.args).toEqual(['http://example.com', true, { contextName: 'app', userName: 'alice' }]);
  });

  it('should shut down exactly once when the active scan fails', async () => {
    client.failures.set('runActiveScan', new Error('boom'));

    const outcome = await orchestrator.runQuickScan(plan({ selfContained: true }));

    expect(outcome.state).toBe(RunState.FAILED);
    expect(client.count('shutdown')).toBe(1);
    expect(client.count('listAlerts')).toBe(0);
    expect(outcome.error).toBeInstanceOf(RemoteOperationError);
    expect(outcome.error?.message).toBe('active-scan failed: boom');
  });

  it('should still shut down when the daemon never becomes ready', async () => {
    client.live = () => false;

    const outcome = await orchestrator.runQuickScan(plan({ selfContained: true }));

    expect(outcome.error).toBeInstanceOf(TimeoutError);
    expect(client.count('openTarget')).toBe(0);
    expect(client.count('shutdown')).toBe(1);
    expect(clock.time).toBe(60000);
  });

  it('should not let a shutdown failure hide the scan result', async () => {
    client.alerts = [makeAlert({ risk: AlertRisk.HIGH })];
    client.failures.set('shutdown', new Error('connection reset'));

    const outcome = await orchestrator.runQuickScan(plan({ selfContained: true }));

    expect(outcome.state).toBe(RunState.DONE);
    expect(outcome.error).toBeUndefined();
    expect(outcome.alerts).toHaveLength(1);
    expect(outcome.shutdownError?.message).toBe('shutdown-daemon failed: connection reset');
  });

  it('should not shut down a daemon it did not start', async () => {
    client.failures.set('openTarget', new Error('unreachable'));

    await orchestrator.runQuickScan(plan());

    expect(client.count('shutdown')).toBe(0);
  });

  it('should report stage events', async () => {
    const started: ScanStage[] = [];
    const failed: ScanStage[] = [];
    orchestrator.on('stage:start', (stage: ScanStage) => started.push(stage));
    orchestrator.on('stage:failed', (stage: ScanStage) => failed.push(stage));
    client.failures.set('runPassiveCrawl', new Error('spider broke'));

    await orchestrator.runQuickScan(plan({ spider: true }));

    expect(started).toEqual([ScanStage.OPEN_TARGET, ScanStage.PASSIVE_CRAWL]);
    expect(failed).toEqual([ScanStage.PASSIVE_CRAWL]);
  });

  it('should keep the stage on remote errors', async () => {
    client.failures.set(
      'openTarget',
      new RemoteOperationError('core.accessUrl', 'ZAP API error for core.accessUrl: bad')
    );

    const outcome = await orchestrator.runQuickScan(plan());

    expect(outcome.error).toBeInstanceOf(RemoteOperationError);
    if (outcome.error instanceof RemoteOperationError) {
      expect(outcome.error.operation).toBe('core.accessUrl');
      expect(outcome.error.stage).toBe(ScanStage.OPEN_TARGET);
    }
  });
});

describe('plannedStages', () => {
  it('should list optional stages only when requested', () => {
    expect(plannedStages(resolveQuickScanPlan({ target: 'http://example.com', spider: true }))).toEqual([
      ScanStage.OPEN_TARGET,
      ScanStage.PASSIVE_CRAWL,
      ScanStage.ACTIVE_SCAN,
      ScanStage.COLLECT_ALERTS,
    ]);
  });
});
