import { Command, Option } from 'commander';

import { resolveIdentity, resolveQuickScanPlan, validateExclusion } from '../../core/engine/QuickScanPlan';
import { ScanOrchestrator } from '../../core/engine/ScanOrchestrator';
import { exitCodeForAlerts } from '../../core/policy/ExitCodePolicy';
import { AlertOutputFormat, AlertRisk, ExitCode } from '../../types/enums';
import { alertRiskNames } from '../../utils/alerts/alert-risk';
import { resolveScannerSelection, scannerGroupNames } from '../../utils/scanners/scanner-groups';
import { ConsoleProgress } from '../ConsoleProgress';
import { Executor } from '../context';

interface IdentityOptions {
  contextName?: string;
  userName?: string;
}

interface ActiveScanOptions extends IdentityOptions {
  scanners?: string;
  recursive: boolean;
}

interface QuickScanOptions extends IdentityOptions {
  selfContained: boolean;
  scanners?: string;
  spider: boolean;
  ajaxSpider: boolean;
  recursive: boolean;
  alertLevel: string;
  exclude?: string;
  startOptions?: string;
  outputFormat: string;
  softFail: boolean;
}

const scannersHelp = (): string =>
  'Comma separated list of scanner IDs and/or groups to use in the scan. ' +
  `Available groups are: ${scannerGroupNames().join(', ')}`;

function addIdentityOptions(command: Command): Command {
  return command
    .option('-c, --context-name <name>', 'Context to use if provided')
    .option(
      '-u, --user-name <name>',
      'Run scan as this user if provided. If this option is used, the context parameter must also be provided'
    );
}

export function registerScanCommands(program: Command, execute: Executor): void {
  program
    .command('open-url')
    .description('Open a URL using the ZAP proxy')
    .argument('<url>', 'URL to open')
    .action((url: string) =>
      execute(async (ctx) => {
        ctx.logger.info(`Accessing URL ${url}`);
        await ctx.client.openTarget(url);
        return ExitCode.SUCCESS;
      })
    );

  addIdentityOptions(program.command('spider').description('Run the spider against a URL').argument('<url>')).action(
    (url: string, options: IdentityOptions) =>
      execute(async (ctx) => {
        const identity = resolveIdentity(options.contextName, options.userName);
        ctx.logger.info('Running spider...');
        await ctx.client.runPassiveCrawl(url, identity);
        return ExitCode.SUCCESS;
      })
  );

  program
    .command('ajax-spider')
    .description('Run the AJAX Spider against a URL')
    .argument('<url>')
    .action((url: string) =>
      execute(async (ctx) => {
        ctx.logger.info('Running AJAX Spider...');
        await ctx.client.runActiveContentCrawl(url);
        return ExitCode.SUCCESS;
      })
    );

  addIdentityOptions(
    program
      .command('active-scan')
      .description('Run an Active Scan against a URL')
      .addHelpText(
        'after',
        "\nThe URL must be in ZAP's site tree: open it with open-url or find it with the spider first."
      )
      .argument('<url>')
      .option('-s, --scanners <list>', scannersHelp())
      .option('-r, --recursive', 'Make scan recursive', false)
  ).action((url: string, options: ActiveScanOptions) =>
    execute(async (ctx) => {
      const scannerIds = options.scanners === undefined ? undefined : resolveScannerSelection(options.scanners);
      const identity = resolveIdentity(options.contextName, options.userName);

      ctx.logger.info('Running an active scan...');
      if (scannerIds) {
        await ctx.client.setEnabledScanners(scannerIds);
      }
      await ctx.client.runActiveScan(url, options.recursive, identity);
      return ExitCode.SUCCESS;
    })
  );

  addIdentityOptions(
    program
      .command('quick-scan')
      .description('Run a quick scan: open a URL, optionally crawl it, run an Active Scan and report alerts')
      .addHelpText('after', '\nExits with 1 when alerts at or above the alert level are found, unless soft-fail is set.')
      .argument('<url>')
      .option(
        '--self-contained',
        'Make the scan self-contained: start the daemon, open the URL, scan it, and shut the daemon down when done',
        false
      )
      .option('-s, --scanners <list>', scannersHelp())
      .option('--spider', 'Run the spider before running the scan', false)
      .option('--ajax-spider', 'Run the AJAX Spider before running the scan', false)
      .option('-r, --recursive', 'Make scan recursive', false)
      .addOption(
        new Option('-l, --alert-level <level>', 'Minimum alert level to include in report')
          .choices(alertRiskNames())
          .default(AlertRisk.HIGH)
      )
      .option('-e, --exclude <regex>', 'Regex to exclude from all aspects of the scan')
      .option(
        '-o, --start-options <options>',
        'Extra options to pass to the ZAP start command when --self-contained is used, e.g. "-config api.key=12345"'
      )
      .addOption(
        new Option('-f, --output-format <format>', 'Output format to print the alerts')
          .choices(Object.values(AlertOutputFormat))
          .default(AlertOutputFormat.TABLE)
      )
      .option('--soft-fail', 'Run the scan but do not set a failing exit code for alerts', false)
  ).action((url: string, options: QuickScanOptions) =>
    execute(async (ctx) => {
      const plan = resolveQuickScanPlan({ target: url, ...options });

      const orchestrator = new ScanOrchestrator(ctx.client, ctx.poller, ctx.logger.child('quick-scan'));
      const showProgress = ctx.runtime.interactive && ctx.logger.isColorized();
      const progress = new ConsoleProgress(ctx.runtime.stderr, showProgress);
      progress.attach(orchestrator);

      const outcome = await orchestrator.runQuickScan(plan);
      progress.stop();
      if (outcome.error) {
        throw outcome.error;
      }

      const qualifying = ctx.alertReporter.report(outcome.alerts, plan.minRisk, plan.outputFormat);
      return exitCodeForAlerts({
        qualifyingAlerts: qualifying.length,
        softFail: plan.softFail,
        softFailOverride: ctx.softFailOverride,
      });
    })
  );

  program
    .command('exclude')
    .description('Exclude a pattern from proxy, spider and active scanner')
    .argument('<pattern>', 'Regular expression to exclude')
    .action((pattern: string) =>
      execute(async (ctx) => {
        await ctx.client.applyExclusion(validateExclusion(pattern));
        return ExitCode.SUCCESS;
      })
    );
}
