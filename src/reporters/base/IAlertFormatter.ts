import { Alert } from '../../types/alert';
import { AlertOutputFormat } from '../../types/enums';

/**
 * Anything alerts and reports can be printed to (process.stdout in production)
 */
export interface OutputStream {
  write(chunk: string): unknown;
}

export interface AlertFormatterOptions {
  /** Colour risk levels; off with --boring */
  colorize?: boolean;
}

export interface IAlertFormatter {
  getFormat(): AlertOutputFormat;
  render(alerts: readonly Alert[]): string;
}

export abstract class BaseAlertFormatter implements IAlertFormatter {
  protected readonly options: Required<AlertFormatterOptions>;

  constructor(options: AlertFormatterOptions = {}) {
    this.options = { colorize: options.colorize ?? true };
  }

  abstract getFormat(): AlertOutputFormat;
  abstract render(alerts: readonly Alert[]): string;
}
