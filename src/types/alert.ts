import { AlertRisk } from './enums';

/**
 * A single finding reported by the ZAP daemon
 */
export interface Alert {
  /** Alert instance identifier */
  readonly id: string;

  /** Identifier of the scan rule that raised the alert */
  readonly pluginId: string;

  /** Alert title, e.g. "Cross Site Scripting (Reflected)" */
  readonly name: string;

  /** Risk level */
  readonly risk: AlertRisk;

  /** Confidence reported by the scan rule */
  readonly confidence: string;

  /** URL the alert was raised on */
  readonly url: string;

  /** CWE identifier, "-1" or "0" when unknown */
  readonly cweId: string;

  /** Affected parameter, if any */
  readonly param?: string;

  /** Evidence snippet, if any */
  readonly evidence?: string;
}

/**
 * Alert counts per risk level
 */
export type AlertSummary = Readonly<Record<AlertRisk, number>> & { readonly total: number };
