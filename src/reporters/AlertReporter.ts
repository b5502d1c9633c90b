import { Alert, AlertSummary } from '../types/alert';
import { AlertOutputFormat, AlertRisk } from '../types/enums';
import { meetsThreshold } from '../utils/alerts/alert-risk';

import { AlertFormatterOptions, IAlertFormatter, OutputStream } from './base/IAlertFormatter';
import { JsonAlertFormatter } from './JsonAlertFormatter';
import { TableAlertFormatter } from './TableAlertFormatter';

/**
 * Alerts at or above minRisk, in input order
 */
export function filterAlerts(alerts: readonly Alert[], minRisk: AlertRisk): Alert[] {
  return alerts.filter((alert) => meetsThreshold(alert.risk, minRisk));
}

export function summarizeAlerts(alerts: readonly Alert[]): AlertSummary {
  const summary = {
    [AlertRisk.INFORMATIONAL]: 0,
    [AlertRisk.LOW]: 0,
    [AlertRisk.MEDIUM]: 0,
    [AlertRisk.HIGH]: 0,
    total: alerts.length,
  };
  alerts.forEach((alert) => {
    summary[alert.risk] += 1;
  });
  return summary;
}

/**
 * Filters alerts by risk and prints them in the chosen format
 */
export class AlertReporter {
  private readonly formatters = new Map<AlertOutputFormat, IAlertFormatter>();

  constructor(
    private readonly output: OutputStream,
    options: AlertFormatterOptions = {}
  ) {
    this.registerFormatter(new TableAlertFormatter(options));
    this.registerFormatter(new JsonAlertFormatter(options));
  }

  registerFormatter(formatter: IAlertFormatter): void {
    this.formatters.set(formatter.getFormat(), formatter);
  }

  /**
   * Print the qualifying alerts and return them
   */
  report(alerts: readonly Alert[], minRisk: AlertRisk, format: AlertOutputFormat): Alert[] {
    const qualifying = filterAlerts(alerts, minRisk);
    this.output.write(this.render(qualifying, format));
    return qualifying;
  }

  render(alerts: readonly Alert[], format: AlertOutputFormat): string {
    const formatter = this.formatters.get(format);
    if (!formatter) {
      throw new Error(`No formatter registered for ${format}`);
    }
    return formatter.render(alerts);
  }
}
