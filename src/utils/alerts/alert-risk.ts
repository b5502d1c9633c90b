import { Alert } from '../../types/alert';
import { ALERT_RISK_RANK, AlertRisk } from '../../types/enums';
import { isRecord, readString } from '../helpers/common-helpers';

const RISK_BY_NAME = new Map<string, AlertRisk>(
  Object.values(AlertRisk).map((risk) => [risk.toLowerCase(), risk])
);

/**
 * Parse a risk name case-insensitively ("high", "High", "HIGH")
 */
export function parseAlertRisk(value: string): AlertRisk | undefined {
  return RISK_BY_NAME.get(value.trim().toLowerCase());
}

export function alertRiskNames(): string[] {
  return Object.values(AlertRisk);
}

/**
 * Whether an alert's risk is at or above the threshold
 */
export function meetsThreshold(risk: AlertRisk, minRisk: AlertRisk): boolean {
  return ALERT_RISK_RANK[risk] >= ALERT_RISK_RANK[minRisk];
}

/**
 * Build a frozen Alert from one entry of `core/view/alerts`.
 * Returns undefined when the entry lacks a recognisable risk.
 */
export function toAlert(raw: unknown): Alert | undefined {
  if (!isRecord(raw)) return undefined;

  const riskName = readString(raw, 'risk');
  const risk = riskName === undefined ? undefined : parseAlertRisk(riskName);
  if (risk === undefined) return undefined;

  const alert: Alert = {
    id: readString(raw, 'id') ?? '',
    pluginId: readString(raw, 'pluginId') ?? '',
    name: readString(raw, 'alert') ?? readString(raw, 'name') ?? '',
    risk,
    confidence: readString(raw, 'confidence') ?? '',
    url: readString(raw, 'url') ?? '',
    cweId: readString(raw, 'cweid') ?? '',
    param: readString(raw, 'param') || undefined,
    evidence: readString(raw, 'evidence') || undefined,
  };
  return Object.freeze(alert);
}
