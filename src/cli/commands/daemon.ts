import { Command } from 'commander';

import { DAEMON_STARTUP_TIMEOUT } from '../../core/engine/QuickScanPlan';
import { ExitCode } from '../../types/enums';
import { Executor } from '../context';
import { parseInteger } from '../parsers';

export function registerDaemonCommands(program: Command, execute: Executor): void {
  program
    .command('start')
    .description('Start the ZAP daemon')
    .option('-o, --start-options <options>', 'Extra options to pass to the ZAP start command, e.g. "-config api.key=12345"')
    .action((options: { startOptions?: string }) =>
      execute(async (ctx) => {
        ctx.logger.info('Starting ZAP daemon');
        await ctx.client.start(options.startOptions);
        await ctx.poller.waitUntilReady(DAEMON_STARTUP_TIMEOUT);
        ctx.logger.info('ZAP is running');
        return ExitCode.SUCCESS;
      })
    );

  program
    .command('shutdown')
    .description('Shut down the ZAP daemon')
    .action(() =>
      execute(async (ctx) => {
        ctx.logger.info('Shutting down ZAP daemon');
        await ctx.client.shutdown();
        return ExitCode.SUCCESS;
      })
    );

  program
    .command('status')
    .description('Check if ZAP is running')
    .addHelpText(
      'after',
      '\nWith --timeout, wait that many seconds for ZAP to start:\n  zapctl status -t 60 && zapctl open-url "http://127.0.0.1/"\n\n' +
        'Exits with 2 when ZAP is not running and no timeout was given.'
    )
    .option('-t, --timeout <seconds>', 'Wait this number of seconds for ZAP to have started', parseInteger)
    .action((options: { timeout?: number }) =>
      execute(async (ctx) => {
        await ctx.poller.waitUntilReady(options.timeout);
        ctx.logger.info('ZAP is running');
        return ExitCode.SUCCESS;
      })
    );
}
