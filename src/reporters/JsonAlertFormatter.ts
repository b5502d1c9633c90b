import { Alert } from '../types/alert';
import { AlertOutputFormat } from '../types/enums';

import { BaseAlertFormatter } from './base/IAlertFormatter';

export class JsonAlertFormatter extends BaseAlertFormatter {
  getFormat(): AlertOutputFormat {
    return AlertOutputFormat.JSON;
  }

  render(alerts: readonly Alert[]): string {
    return `${JSON.stringify(alerts, null, 2)}\n`;
  }
}
