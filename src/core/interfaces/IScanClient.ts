import { Alert } from '../../types/alert';
import { ScanIdentity } from '../../types/config';
import { AlertRisk, ReportFormat } from '../../types/enums';

/**
 * Remote operations the CLI performs against a ZAP daemon.
 *
 * Every method is a blocking remote call; failures reject with an error
 * the caller treats as opaque.
 */
export interface IScanClient {
  /** Start the daemon process; extra options are passed to its command line */
  start(options?: string): Promise<void>;

  /** Ask the daemon to shut down and wait for it to stop */
  shutdown(): Promise<void>;

  /** Whether the daemon answers API calls */
  probeLiveness(): Promise<boolean>;

  /** Access a URL through the proxy so it enters the site tree */
  openTarget(url: string): Promise<void>;

  /** Run the traditional spider to completion */
  runPassiveCrawl(url: string, identity?: ScanIdentity): Promise<void>;

  /** Run the AJAX spider to completion */
  runActiveContentCrawl(url: string): Promise<void>;

  /** Run an active scan to completion */
  runActiveScan(url: string, recursive: boolean, identity?: ScanIdentity): Promise<void>;

  /** Enable exactly the given scanners */
  setEnabledScanners(ids: ReadonlySet<string>): Promise<void>;

  /** Exclude a regex from proxy, spider and active scanner */
  applyExclusion(pattern: string): Promise<void>;

  /** Alerts at or above the given risk, in the daemon's order */
  listAlerts(minRisk: AlertRisk): Promise<Alert[]>;

  /** Render a report; written to outputPath, or to stdout without one */
  renderReport(format: ReportFormat, outputPath?: string): Promise<void>;
}

/**
 * Active scan rule as listed by the daemon
 */
export interface ScannerInfo {
  id: string;
  name: string;
  policyId: string;
  enabled: boolean;
  attackStrength: string;
  alertThreshold: string;
}

/**
 * Active scan policy category as listed by the daemon
 */
export interface PolicyInfo {
  id: string;
  name: string;
  enabled: boolean;
  attackStrength: string;
  alertThreshold: string;
}

/**
 * Scanner and policy management beyond the quick-scan workflow
 */
export interface IScanPolicyClient {
  listScanners(policyId?: string): Promise<ScannerInfo[]>;
  enableScanners(ids: ReadonlySet<string>): Promise<void>;
  disableScanners(ids: ReadonlySet<string>): Promise<void>;
  listPolicies(): Promise<PolicyInfo[]>;
  setEnabledPolicies(ids: readonly string[]): Promise<void>;
}

export type IZapClient = IScanClient & IScanPolicyClient;
