import { Command, Option } from 'commander';

import { resolveAlertRisk, resolveOutputFormat } from '../../core/engine/QuickScanPlan';
import { exitCodeForAlerts } from '../../core/policy/ExitCodePolicy';
import { AlertOutputFormat, AlertRisk, ExitCode, ReportFormat } from '../../types/enums';
import { alertRiskNames } from '../../utils/alerts/alert-risk';
import { Executor } from '../context';
import { parseBoolean } from '../parsers';

interface AlertsOptions {
  alertLevel: string;
  outputFormat: string;
  exitCode: boolean;
}

interface ReportOptions {
  output?: string;
  outputFormat: ReportFormat;
}

export function registerAlertCommands(program: Command, execute: Executor): void {
  program
    .command('alerts')
    .description('Show alerts at the given alert level')
    .addOption(
      new Option('-l, --alert-level <level>', 'Minimum alert level to include in report')
        .choices(alertRiskNames())
        .default(AlertRisk.HIGH)
    )
    .addOption(
      new Option('-f, --output-format <format>', 'Output format to print the alerts')
        .choices(Object.values(AlertOutputFormat))
        .default(AlertOutputFormat.TABLE)
    )
    .option(
      '--exit-code <bool>',
      'Whether to set a non-zero exit code when there are any alerts of the specified level',
      parseBoolean,
      true
    )
    .action((options: AlertsOptions) =>
      execute(async (ctx) => {
        const minRisk = resolveAlertRisk(options.alertLevel);
        const format = resolveOutputFormat(options.outputFormat);

        const alerts = await ctx.client.listAlerts(minRisk);
        const qualifying = ctx.alertReporter.report(alerts, minRisk, format);

        if (!options.exitCode) {
          return ExitCode.SUCCESS;
        }
        return exitCodeForAlerts({
          qualifyingAlerts: qualifying.length,
          softFail: false,
          softFailOverride: ctx.softFailOverride,
        });
      })
    );

  program
    .command('report')
    .description('Generate an XML, Markdown or HTML report')
    .option('-o, --output <file>', 'Output file for report; printed to stdout when omitted')
    .addOption(
      new Option('-f, --output-format <format>', 'Report format')
        .choices(Object.values(ReportFormat))
        .default(ReportFormat.XML)
    )
    .action((options: ReportOptions) =>
      execute(async (ctx) => {
        await ctx.client.renderReport(options.outputFormat, options.output);
        if (options.output) {
          ctx.logger.info(`Report saved to "${options.output}"`);
        }
        return ExitCode.SUCCESS;
      })
    );
}
