import * as fs from 'fs';
import * as path from 'path';

import { ReportError, getErrorMessage } from '../core/errors';
import { Logger } from '../utils/logger/Logger';

import { OutputStream } from './base/IAlertFormatter';

/**
 * Writes rendered reports to a file, or to the output stream when no file is given
 */
export class ReportWriter {
  private readonly logger: Logger;

  constructor(
    private readonly output: OutputStream,
    logger?: Logger
  ) {
    this.logger = logger ?? new Logger({ prefix: 'ReportWriter' });
  }

  async write(content: string, outputPath?: string): Promise<void> {
    if (!outputPath) {
      this.output.write(content.endsWith('\n') ? content : `${content}\n`);
      return;
    }

    const outPath = path.resolve(outputPath);
    try {
      await fs.promises.mkdir(path.dirname(outPath), { recursive: true });
      await fs.promises.writeFile(outPath, content, 'utf-8');
    } catch (error) {
      throw new ReportError(`Cannot write report to ${outPath}: ${getErrorMessage(error)}`, { cause: error });
    }
    this.logger.debug(`Wrote ${content.length} characters to ${outPath}`);
  }
}
