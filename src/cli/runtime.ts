import { ZapController } from '../core/client/ZapController';
import { Clock, systemClock } from '../core/daemon/ReadinessPoller';
import { IZapClient } from '../core/interfaces/IScanClient';
import { OutputStream } from '../reporters/base/IAlertFormatter';
import { ZapConnectionConfig } from '../types/config';
import { ExitCode } from '../types/enums';
import { Logger } from '../utils/logger/Logger';

/**
 * Everything the CLI touches outside its own process state.
 * Tests supply a fake client, clock and exit to run commands in-process.
 */
export interface CliRuntime {
  createClient(config: ZapConnectionConfig, logger: Logger, output: OutputStream): IZapClient;
  clock: Clock;
  stdout: OutputStream;
  /** Where commander prints usage errors and the progress spinner draws */
  stderr: NodeJS.WritableStream;
  /** Whether progress spinners may be drawn */
  interactive: boolean;
  /** Environment read for settings commander does not bind, such as SOFT_FAIL */
  env: NodeJS.ProcessEnv;
  exit(code: ExitCode): void;
}

export function createDefaultRuntime(): CliRuntime {
  return {
    createClient: (config, logger, output) => new ZapController(config, { logger, output, clock: systemClock }),
    clock: systemClock,
    stdout: process.stdout,
    stderr: process.stderr,
    interactive: Boolean(process.stderr.isTTY),
    env: process.env,
    exit: (code) => {
      process.exitCode = code;
    },
  };
}
