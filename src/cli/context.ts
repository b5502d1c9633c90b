import { Command } from 'commander';

import { ConfigurationManager } from '../core/config/ConfigurationManager';
import { ReadinessPoller } from '../core/daemon/ReadinessPoller';
import { getErrorMessage } from '../core/errors';
import { IZapClient } from '../core/interfaces/IScanClient';
import { exitCodeForError } from '../core/policy/ExitCodePolicy';
import { AlertReporter } from '../reporters/AlertReporter';
import { ZapConnectionConfig } from '../types/config';
import { ExitCode, LogLevel } from '../types/enums';
import { Logger } from '../utils/logger/Logger';

import { CliRuntime } from './runtime';

/**
 * Options accepted before the subcommand
 */
export type GlobalCliOptions = {
  boring?: boolean;
  verbose?: boolean;
  zapPath?: string;
  port?: number;
  zapUrl?: string;
  apiKey?: string;
  logPath?: string;
  softFail?: boolean;
  config?: string;
};

/**
 * Per-invocation collaborators handed to every command
 */
export interface CommandContext {
  config: ZapConnectionConfig;
  logger: Logger;
  client: IZapClient;
  poller: ReadinessPoller;
  alertReporter: AlertReporter;
  /** Process-wide soft-fail override, read once from --soft-fail / SOFT_FAIL */
  softFailOverride: boolean;
  runtime: CliRuntime;
}

export type CommandTask = (ctx: CommandContext) => Promise<ExitCode>;
export type Executor = (task: CommandTask) => Promise<void>;

export function createRootLogger(options: GlobalCliOptions): Logger {
  return new Logger({
    level: options.verbose ? LogLevel.DEBUG : LogLevel.INFO,
    colorize: !options.boring,
  });
}

/**
 * Build the connection config from the global options, then wire up the client
 */
export function buildContext(program: Command, runtime: CliRuntime, logger: Logger): CommandContext {
  const options = program.opts<GlobalCliOptions>();
  const configManager = ConfigurationManager.getInstance();
  configManager.setLogger(logger.child('config'));

  const fileConfig = options.config ? configManager.loadFromFile(options.config) : {};
  const config = configManager.loadFromObject(fileConfig, {
    zapPath: options.zapPath,
    port: options.port,
    zapUrl: options.zapUrl,
    apiKey: options.apiKey,
    logPath: options.logPath,
    softFail: options.softFail || isSet(runtime.env.SOFT_FAIL) ? true : undefined,
  });

  const client = runtime.createClient(config, logger.child('zap'), runtime.stdout);
  return {
    config,
    logger,
    client,
    poller: new ReadinessPoller(() => client.probeLiveness(), { clock: runtime.clock, logger: logger.child('poller') }),
    alertReporter: new AlertReporter(runtime.stdout, { colorize: logger.isColorized() }),
    softFailOverride: config.softFail,
    runtime,
  };
}

/**
 * An environment flag is on when it holds any non-empty value
 */
function isSet(value: string | undefined): boolean {
  return value !== undefined && value !== '';
}

/**
 * Run a command task and turn its result, or its failure, into an exit code
 */
export function createExecutor(program: Command, runtime: CliRuntime): Executor {
  return async (task) => {
    const logger = createRootLogger(program.opts<GlobalCliOptions>());
    try {
      const ctx = buildContext(program, runtime, logger);
      runtime.exit(await task(ctx));
    } catch (error) {
      logger.error(getErrorMessage(error));
      runtime.exit(exitCodeForError(error));
    }
  };
}
