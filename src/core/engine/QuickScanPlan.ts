import { QuickScanInput, QuickScanPlan, ScanIdentity } from '../../types/config';
import { AlertOutputFormat, AlertRisk } from '../../types/enums';
import { alertRiskNames, parseAlertRisk } from '../../utils/alerts/alert-risk';
import { resolveScannerSelection } from '../../utils/scanners/scanner-groups';
import { isValidRegex } from '../../utils/validators/config-validator';
import { UsageError } from '../errors';

/** Seconds to wait for a self-started daemon to answer */
export const DAEMON_STARTUP_TIMEOUT = 60;

export const DEFAULT_ALERT_RISK = AlertRisk.HIGH;

/**
 * Pair a context with an optional user; a user without a context is rejected
 */
export function resolveIdentity(contextName?: string, userName?: string): ScanIdentity | undefined {
  if (userName && !contextName) {
    throw new UsageError('A user name can only be used together with a context name (--context-name)');
  }
  if (!contextName) return undefined;
  return userName ? { contextName, userName } : { contextName };
}

export function resolveAlertRisk(level?: string): AlertRisk {
  if (level === undefined) return DEFAULT_ALERT_RISK;
  const risk = parseAlertRisk(level);
  if (risk === undefined) {
    throw new UsageError(`Invalid alert level "${level}". Expected one of: ${alertRiskNames().join(', ')}`);
  }
  return risk;
}

export function resolveOutputFormat(format?: string): AlertOutputFormat {
  if (format === undefined) return AlertOutputFormat.TABLE;
  const match = Object.values(AlertOutputFormat).find((f) => f === format.toLowerCase());
  if (match === undefined) {
    throw new UsageError(
      `Invalid output format "${format}". Expected one of: ${Object.values(AlertOutputFormat).join(', ')}`
    );
  }
  return match;
}

export function validateExclusion(pattern: string): string {
  if (!isValidRegex(pattern)) {
    throw new UsageError(`Invalid regular expression: ${pattern}`);
  }
  return pattern;
}

/**
 * Validate command-line input and turn it into a typed plan.
 *
 * Every check happens here, so a rejected plan never reaches the daemon.
 */
export function resolveQuickScanPlan(input: QuickScanInput): QuickScanPlan {
  const identity = resolveIdentity(input.contextName, input.userName);

  return {
    target: input.target,
    selfContained: input.selfContained ?? false,
    startOptions: input.startOptions,
    startupTimeout: DAEMON_STARTUP_TIMEOUT,
    scannerIds: input.scanners === undefined ? undefined : resolveScannerSelection(input.scanners),
    exclude: input.exclude === undefined ? undefined : validateExclusion(input.exclude),
    spider: input.spider ?? false,
    ajaxSpider: input.ajaxSpider ?? false,
    recursive: input.recursive ?? false,
    identity,
    minRisk: resolveAlertRisk(input.alertLevel),
    outputFormat: resolveOutputFormat(input.outputFormat),
    softFail: input.softFail ?? false,
  };
}
