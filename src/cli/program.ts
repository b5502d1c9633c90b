import { Command, Option } from 'commander';

import { VERSION } from '../version';

import { registerAlertCommands } from './commands/alerts';
import { registerDaemonCommands } from './commands/daemon';
import { registerScanCommands } from './commands/scan';
import { registerScannerCommands } from './commands/scanners';
import { createExecutor } from './context';
import { parseInteger } from './parsers';
import { CliRuntime, createDefaultRuntime } from './runtime';

/**
 * Build the zapctl command tree.
 *
 * Global options must come before the subcommand, so `--soft-fail` before a
 * command is the process-wide override and after `quick-scan` is its own flag.
 */
export function createProgram(runtime: CliRuntime = createDefaultRuntime()): Command {
  const program = new Command();

  program
    .name('zapctl')
    .version(VERSION)
    .description(`zapctl v${VERSION} - a command line tool for driving the OWASP ZAP daemon`)
    .enablePositionalOptions()
    .exitOverride()
    .configureOutput({
      writeOut: (str) => runtime.stdout.write(str),
      writeErr: (str) => runtime.stderr.write(str),
    })
    .option('--boring', 'Remove color from console output', false)
    .option('-v, --verbose', 'Add more verbose debugging output', false)
    .addOption(
      new Option('--zap-path <path>', 'Path to the ZAP daemon install directory (default: /zap)').env('ZAP_PATH')
    )
    .addOption(
      new Option('-p, --port <port>', 'Port of the ZAP proxy (default: 8090)').env('ZAP_PORT').argParser(parseInteger)
    )
    .addOption(
      new Option('--zap-url <url>', 'The URL of the ZAP proxy (default: http://127.0.0.1)').env('ZAP_URL')
    )
    .addOption(new Option('--api-key <key>', 'The API key for using the ZAP API if required').env('ZAP_API_KEY'))
    .addOption(
      new Option(
        '--log-path <path>',
        'Directory in which to save the ZAP output log file (default: the ZAP path)'
      ).env('ZAP_LOG_PATH')
    )
    .option(
      '--soft-fail',
      'Run scans but never set a failing exit code because of alerts (env: SOFT_FAIL, any non-empty value)'
    )
    .option('--config <file>', 'Load connection settings from a JSON file');

  const execute = createExecutor(program, runtime);
  registerDaemonCommands(program, execute);
  registerScanCommands(program, execute);
  registerAlertCommands(program, execute);
  registerScannerCommands(program, execute);

  return program;
}
