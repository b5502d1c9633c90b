import { ReportWriter } from '../../reporters/ReportWriter';
import { OutputStream } from '../../reporters/base/IAlertFormatter';
import { Alert } from '../../types/alert';
import { ScanIdentity, ZapConnectionConfig } from '../../types/config';
import { AlertRisk, ReportFormat } from '../../types/enums';
import { meetsThreshold, toAlert } from '../../utils/alerts/alert-risk';
import { isRecord, readString } from '../../utils/helpers/common-helpers';
import { Logger } from '../../utils/logger/Logger';
import { Clock, ReadinessPoller, systemClock } from '../daemon/ReadinessPoller';
import { ZapDaemon } from '../daemon/ZapDaemon';
import { RemoteOperationError, ReportError } from '../errors';
import { IZapClient, PolicyInfo, ScannerInfo } from '../interfaces/IScanClient';

import { ZapApiClient } from './ZapApiClient';

export interface ZapControllerOptions {
  api?: ZapApiClient;
  daemon?: ZapDaemon;
  clock?: Clock;
  output?: OutputStream;
  logger?: Logger;
  /** Pause between spider / scan status polls (ms) */
  statusIntervalMs?: number;
  /** Seconds to wait for the daemon to stop after a shutdown request */
  shutdownTimeout?: number;
}

const REPORT_ENDPOINTS: Record<ReportFormat, string> = {
  [ReportFormat.XML]: 'xmlreport',
  [ReportFormat.HTML]: 'htmlreport',
  [ReportFormat.MARKDOWN]: 'mdreport',
};

const ALERT_PAGE_SIZE = 500;

/**
 * ZAP implementation of the scan client: HTTP API calls plus the local daemon process
 */
export class ZapController implements IZapClient {
  private readonly api: ZapApiClient;
  private readonly daemon: ZapDaemon;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly reportWriter: ReportWriter;
  private readonly statusIntervalMs: number;
  private readonly shutdownTimeout: number;

  constructor(config: ZapConnectionConfig, options: ZapControllerOptions = {}) {
    this.logger = options.logger ?? new Logger({ prefix: 'ZapController' });
    this.api = options.api ?? new ZapApiClient(config, { logger: this.logger.child('api') });
    this.daemon = options.daemon ?? new ZapDaemon(config, { logger: this.logger.child('daemon') });
    this.clock = options.clock ?? systemClock;
    this.reportWriter = new ReportWriter(options.output ?? process.stdout, this.logger.child('report'));
    this.statusIntervalMs = options.statusIntervalMs ?? 2000;
    this.shutdownTimeout = options.shutdownTimeout ?? 60;
  }

  async start(options?: string): Promise<void> {
    if (await this.probeLiveness()) {
      this.logger.info('ZAP is already running');
      return;
    }
    const child = this.daemon.launch(options);
    this.logger.debug(`ZAP daemon spawned with pid ${child.pid ?? 'unknown'}`);
  }

  async shutdown(): Promise<void> {
    await this.api.action('core', 'shutdown');
    const poller = new ReadinessPoller(() => this.probeLiveness(), {
      clock: this.clock,
      logger: this.logger.child('poller'),
    });
    await poller.waitUntilStopped(this.shutdownTimeout);
  }

  async probeLiveness(): Promise<boolean> {
    const result = await this.api.ping();
    if (result.apiError !== undefined) {
      this.logger.warn(`ZAP is running at ${this.api.baseUrl} but rejected the API call: ${result.apiError}`);
    } else if (result.reachable) {
      this.logger.debug(`ZAP ${result.version ?? ''} answered at ${this.api.baseUrl}`);
    }
    return result.reachable;
  }

  async openTarget(url: string): Promise<void> {
    this.logger.debug(`Accessing ${url} through ZAP`);
    await this.api.action('core', 'accessUrl', { url, followRedirects: true });
  }

  async runPassiveCrawl(url: string, identity?: ScanIdentity): Promise<void> {
    let response: Record<string, unknown>;
    if (identity?.userName) {
      const { contextId, userId } = await this.resolveIdentity(identity);
      response = await this.api.action('spider', 'scanAsUser', { url, contextId, userId });
    } else {
      response = await this.api.action('spider', 'scan', { url, contextName: identity?.contextName });
    }

    const scanId = this.requireScanId('spider.scan', response);
    this.logger.debug(`Spider ${scanId} started for ${url}`);
    await this.waitForProgress('Spider', async () =>
      parseProgress('spider.status', await this.api.view('spider', 'status', { scanId }))
    );
  }

  async runActiveContentCrawl(url: string): Promise<void> {
    await this.api.action('ajaxSpider', 'scan', { url });

    for (;;) {
      const status = await this.api.view('ajaxSpider', 'status');
      if (readString(status, 'status') !== 'running') break;
      this.logger.debug('AJAX Spider is running');
      await this.clock.sleep(this.statusIntervalMs);
    }
  }

  async runActiveScan(url: string, recursive: boolean, identity?: ScanIdentity): Promise<void> {
    await this.assertInSiteTree(url);

    let response: Record<string, unknown>;
    if (identity) {
      const { contextId, userId } = await this.resolveIdentity(identity);
      response = userId
        ? await this.api.action('ascan', 'scanAsUser', { url, contextId, userId, recurse: recursive })
        : await this.api.action('ascan', 'scan', { url, contextId, recurse: recursive });
    } else {
      response = await this.api.action('ascan', 'scan', { url, recurse: recursive });
    }

    const scanId = this.requireScanId('ascan.scan', response);
    this.logger.debug(`Active scan ${scanId} started for ${url}`);
    await this.waitForProgress('Active scan', async () =>
      parseProgress('ascan.status', await this.api.view('ascan', 'status', { scanId }))
    );
  }

  async setEnabledScanners(ids: ReadonlySet<string>): Promise<void> {
    this.logger.debug(`Enabling scanners: ${[...ids].join(',')}`);
    await this.api.action('ascan', 'disableAllScanners');
    await this.api.action('ascan', 'enableScanners', { ids: [...ids].join(',') });
  }

  async applyExclusion(pattern: string): Promise<void> {
    this.logger.debug(`Excluding ${pattern} from proxy, spider and active scanner`);
    await this.api.action('core', 'excludeFromProxy', { regex: pattern });
    await this.api.action('spider', 'excludeFromScan', { regex: pattern });
    await this.api.action('ascan', 'excludeFromScan', { regex: pattern });
  }

  async listAlerts(minRisk: AlertRisk): Promise<Alert[]> {
    const alerts: Alert[] = [];
    for (let start = 0; ; start += ALERT_PAGE_SIZE) {
      const page = await this.api.view('core', 'alerts', { start, count: ALERT_PAGE_SIZE });
      const entries = Array.isArray(page.alerts) ? page.alerts : [];
      for (const entry of entries) {
        const alert = toAlert(entry);
        if (alert && meetsThreshold(alert.risk, minRisk)) alerts.push(alert);
      }
      if (entries.length < ALERT_PAGE_SIZE) break;
    }
    return alerts;
  }

  async renderReport(format: ReportFormat, outputPath?: string): Promise<void> {
    let content: string;
    try {
      content = await this.api.other('core', REPORT_ENDPOINTS[format]);
    } catch (error) {
      if (error instanceof RemoteOperationError) {
        throw new ReportError(`Cannot render ${format} report: ${error.message}`, { cause: error });
      }
      throw error;
    }
    await this.reportWriter.write(content, outputPath);
  }

  async listScanners(policyId?: string): Promise<ScannerInfo[]> {
    const response = await this.api.view('ascan', 'scanners', { policyId });
    const entries = Array.isArray(response.scanners) ? response.scanners : [];
    return entries.filter(isRecord).map((entry) => ({
      id: readString(entry, 'id') ?? '',
      name: readString(entry, 'name') ?? '',
      policyId: readString(entry, 'policyId') ?? '',
      enabled: readString(entry, 'enabled') === 'true',
      attackStrength: readString(entry, 'attackStrength') ?? '',
      alertThreshold: readString(entry, 'alertThreshold') ?? '',
    }));
  }

  async enableScanners(ids: ReadonlySet<string>): Promise<void> {
    await this.api.action('ascan', 'enableScanners', { ids: [...ids].join(',') });
  }

  async disableScanners(ids: ReadonlySet<string>): Promise<void> {
    await this.api.action('ascan', 'disableScanners', { ids: [...ids].join(',') });
  }

  async listPolicies(): Promise<PolicyInfo[]> {
    const response = await this.api.view('ascan', 'policies');
    const entries = Array.isArray(response.policies) ? response.policies : [];
    return entries.filter(isRecord).map((entry) => ({
      id: readString(entry, 'id') ?? '',
      name: readString(entry, 'name') ?? '',
      enabled: readString(entry, 'enabled') === 'true',
      attackStrength: readString(entry, 'attackStrength') ?? '',
      alertThreshold: readString(entry, 'alertThreshold') ?? '',
    }));
  }

  async setEnabledPolicies(ids: readonly string[]): Promise<void> {
    await this.api.action('ascan', 'setEnabledPolicies', { ids: ids.join(',') });
  }

  private async waitForProgress(label: string, readProgress: () => Promise<number>): Promise<void> {
    let progress = await readProgress();
    while (progress < 100) {
      this.logger.debug(`${label} progress: ${progress}%`);
      await this.clock.sleep(this.statusIntervalMs);
      progress = await readProgress();
    }
    this.logger.debug(`${label} completed`);
  }

  private requireScanId(operation: string, response: Record<string, unknown>): string {
    const scanId = readString(response, 'scan') ?? readString(response, 'scanAsUser');
    if (scanId === undefined || !/^\d+$/.test(scanId)) {
      throw new RemoteOperationError(operation, `ZAP did not start the scan: ${scanId ?? 'no scan id returned'}`);
    }
    return scanId;
  }

  private async assertInSiteTree(url: string): Promise<void> {
    const response = await this.api.view('core', 'urls', { baseurl: url });
    const urls = Array.isArray(response.urls) ? response.urls.filter((u): u is string => typeof u === 'string') : [];
    if (!urls.some((known) => known === url || known.startsWith(url))) {
      throw new RemoteOperationError(
        'ascan.scan',
        `Cannot scan ${url}: it is not in the site tree. Open the URL or run the spider first.`
      );
    }
  }

  private async resolveIdentity(identity: ScanIdentity): Promise<{ contextId: string; userId?: string }> {
    const contextResponse = await this.api.view('context', 'context', { contextName: identity.contextName });
    const context = contextResponse.context;
    const contextId = isRecord(context) ? readString(context, 'id') : undefined;
    if (contextId === undefined) {
      throw new RemoteOperationError('context.context', `No context named "${identity.contextName}" was found`);
    }

    if (!identity.userName) {
      return { contextId };
    }

    const usersResponse = await this.api.view('users', 'usersList', { contextId });
    const users = Array.isArray(usersResponse.usersList) ? usersResponse.usersList.filter(isRecord) : [];
    const user = users.find((u) => readString(u, 'name') === identity.userName);
    const userId = user ? readString(user, 'id') : undefined;
    if (userId === undefined) {
      throw new RemoteOperationError(
        'users.usersList',
        `No user named "${identity.userName}" was found in context "${identity.contextName}"`
      );
    }
    return { contextId, userId };
  }
}

/**
 * Percentage from a spider or active scan status response
 */
function parseProgress(operation: string, response: Record<string, unknown>): number {
  const status = readString(response, 'status');
  if (status === undefined || !/^\d+$/.test(status)) {
    throw new RemoteOperationError(
      operation,
      `Unexpected progress from ZAP for ${operation}: ${status ?? 'no status returned'}`
    );
  }
  return Number(status);
}
