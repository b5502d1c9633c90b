import chalk from 'chalk';

import { Alert } from '../types/alert';
import { AlertOutputFormat, AlertRisk } from '../types/enums';
import { renderGrid } from '../utils/helpers/table';

import { AlertFormatterOptions, BaseAlertFormatter } from './base/IAlertFormatter';

const HEADERS = ['Alert', 'Risk', 'CWE ID', 'URL'];
const RISK_COLUMN = 1;

export class TableAlertFormatter extends BaseAlertFormatter {
  private readonly paint: chalk.Chalk;

  constructor(options: AlertFormatterOptions = {}) {
    super(options);
    this.paint = new chalk.Instance({ level: this.options.colorize ? chalk.level : 0 });
  }

  getFormat(): AlertOutputFormat {
    return AlertOutputFormat.TABLE;
  }

  /**
   * "Issues found: N" followed by a grid, one row per alert
   */
  render(alerts: readonly Alert[]): string {
    const lines = [`Issues found: ${alerts.length}`];
    if (alerts.length > 0) {
      const rows = alerts.map((a) => [a.name, a.risk, a.cweId, a.url]);
      lines.push(
        ...renderGrid(HEADERS, rows, (text, row, col) =>
          col === RISK_COLUMN ? this.colorRisk(alerts[row].risk, text) : text
        )
      );
    }
    return `${lines.join('\n')}\n`;
  }

  private colorRisk(risk: AlertRisk, text: string): string {
    switch (risk) {
      case AlertRisk.HIGH:
        return this.paint.red(text);
      case AlertRisk.MEDIUM:
        return this.paint.yellow(text);
      case AlertRisk.LOW:
        return this.paint.blue(text);
      default:
        return this.paint.gray(text);
    }
  }
}
