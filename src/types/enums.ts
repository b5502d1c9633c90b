/**
 * Risk levels ZAP assigns to alerts, in ascending order
 */
export enum AlertRisk {
  INFORMATIONAL = 'Informational',
  LOW = 'Low',
  MEDIUM = 'Medium',
  HIGH = 'High',
}

/**
 * Numeric rank of each risk level; higher is more severe
 */
export const ALERT_RISK_RANK: Readonly<Record<AlertRisk, number>> = {
  [AlertRisk.INFORMATIONAL]: 0,
  [AlertRisk.LOW]: 1,
  [AlertRisk.MEDIUM]: 2,
  [AlertRisk.HIGH]: 3,
};

/**
 * Formats for printing alerts on the console
 */
export enum AlertOutputFormat {
  TABLE = 'table',
  JSON = 'json',
}

/**
 * Report formats rendered by the ZAP daemon
 */
export enum ReportFormat {
  XML = 'xml',
  HTML = 'html',
  MARKDOWN = 'md',
}

/**
 * Log levels
 */
export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}

/**
 * States of a quick scan run
 */
export enum RunState {
  IDLE = 'idle',
  STARTING = 'starting',
  CONFIGURING = 'configuring',
  TARGET_OPEN = 'target-open',
  CRAWLING = 'crawling',
  ACTIVE_SCANNING = 'active-scanning',
  COLLECTING = 'collecting',
  SHUTTING_DOWN = 'shutting-down',
  DONE = 'done',
  FAILED = 'failed',
}

/**
 * Individual remote stages of a quick scan, in execution order
 */
export enum ScanStage {
  START_DAEMON = 'start-daemon',
  CONFIGURE_SCANNERS = 'configure-scanners',
  APPLY_EXCLUSION = 'apply-exclusion',
  OPEN_TARGET = 'open-target',
  PASSIVE_CRAWL = 'passive-crawl',
  ACTIVE_CONTENT_CRAWL = 'active-content-crawl',
  ACTIVE_SCAN = 'active-scan',
  COLLECT_ALERTS = 'collect-alerts',
  SHUTDOWN_DAEMON = 'shutdown-daemon',
}

/**
 * Process exit codes
 */
export enum ExitCode {
  SUCCESS = 0,
  ALERTS_FOUND = 1,
  NOT_RUNNING = 2,
  ERROR = 3,
}
