import { AlertOutputFormat, AlertRisk } from './enums';

/**
 * How to reach (and if needed start) the ZAP daemon
 */
export interface ZapConnectionConfig {
  /** Installation directory containing zap.sh / zap.bat */
  zapPath: string;

  /** Port the daemon listens on */
  port: number;

  /** Base URL of the daemon, without the port */
  zapUrl: string;

  /** API key, empty when the API key is disabled */
  apiKey: string;

  /** Directory for zap.log; falls back to zapPath */
  logPath?: string;

  /** Process-wide soft-fail override */
  softFail: boolean;
}

/**
 * Context and user a crawl or scan runs as
 */
export interface ScanIdentity {
  contextName: string;
  userName?: string;
}

/**
 * Raw quick-scan input as collected from the command line
 */
export interface QuickScanInput {
  target: string;
  selfContained?: boolean;
  startOptions?: string;
  scanners?: string;
  exclude?: string;
  spider?: boolean;
  ajaxSpider?: boolean;
  recursive?: boolean;
  contextName?: string;
  userName?: string;
  alertLevel?: string;
  outputFormat?: string;
  softFail?: boolean;
}

/**
 * Fully resolved and validated quick-scan configuration
 */
export interface QuickScanPlan {
  readonly target: string;
  readonly selfContained: boolean;
  readonly startOptions?: string;
  /** Seconds to wait for a self-started daemon */
  readonly startupTimeout: number;
  readonly scannerIds?: ReadonlySet<string>;
  readonly exclude?: string;
  readonly spider: boolean;
  readonly ajaxSpider: boolean;
  readonly recursive: boolean;
  readonly identity?: ScanIdentity;
  readonly minRisk: AlertRisk;
  readonly outputFormat: AlertOutputFormat;
  readonly softFail: boolean;
}
