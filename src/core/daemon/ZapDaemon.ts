import { SpawnOptions, spawn } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';

import { ZapConnectionConfig } from '../../types/config';
import { splitArguments } from '../../utils/helpers/common-helpers';
import { Logger } from '../../utils/logger/Logger';
import { RemoteOperationError, getErrorMessage } from '../errors';

/**
 * The parts of a child process the daemon launcher needs
 */
export interface DaemonProcess {
  pid?: number;
  unref(): void;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => DaemonProcess;

export const LOG_FILE_NAME = 'zap.log';

/**
 * Launches the ZAP daemon as a detached background process.
 *
 * Output goes to zap.log under the log path (or the ZAP install directory).
 */
export class ZapDaemon {
  private readonly logger: Logger;
  private readonly spawnProcess: SpawnFn;

  constructor(
    private readonly config: Pick<ZapConnectionConfig, 'zapPath' | 'port' | 'apiKey' | 'logPath'>,
    options: { logger?: Logger; spawn?: SpawnFn } = {}
  ) {
    this.logger = options.logger ?? new Logger({ prefix: 'ZapDaemon' });
    this.spawnProcess = options.spawn ?? spawn;
  }

  get executable(): string {
    return path.join(this.config.zapPath, process.platform === 'win32' ? 'zap.bat' : 'zap.sh');
  }

  get logFile(): string {
    return path.join(this.config.logPath ?? this.config.zapPath, LOG_FILE_NAME);
  }

  /**
   * Command-line arguments for the daemon, extra options last
   */
  buildArguments(extraOptions?: string): string[] {
    const args = ['-daemon', '-port', String(this.config.port)];
    if (this.config.apiKey) {
      args.push('-config', `api.key=${this.config.apiKey}`);
    }
    if (extraOptions) {
      args.push(...splitArguments(extraOptions));
    }
    return args;
  }

  /**
   * Spawn the daemon and return without waiting for it to answer
   */
  launch(extraOptions?: string): DaemonProcess {
    const executable = this.executable;
    if (!fs.existsSync(executable)) {
      throw new RemoteOperationError('start', `ZAP executable not found at ${executable}`);
    }

    const args = this.buildArguments(extraOptions);
    this.logger.debug(`Starting ${executable} ${args.join(' ')}`);
    this.logger.debug(`Logging ZAP output to ${this.logFile}`);

    let logFd: number;
    try {
      logFd = fs.openSync(this.logFile, 'a');
    } catch (error) {
      throw new RemoteOperationError('start', `Cannot open ZAP log file ${this.logFile}: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }

    try {
      const child = this.spawnProcess(executable, args, {
        cwd: this.config.zapPath,
        detached: true,
        stdio: ['ignore', logFd, logFd],
      });
      child.on('error', (err) => {
        this.logger.error(`ZAP process failed: ${err.message}`);
      });
      child.unref();
      return child;
    } finally {
      fs.closeSync(logFd);
    }
  }
}
