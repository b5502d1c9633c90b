import { Command } from 'commander';

import { UsageError } from '../../core/errors';
import { ExitCode } from '../../types/enums';
import { splitList } from '../../utils/helpers/common-helpers';
import { renderGrid } from '../../utils/helpers/table';
import { resolveScannerSelection, scannerGroupNames } from '../../utils/scanners/scanner-groups';
import { Executor } from '../context';

function resolvePolicyIds(value: string): string[] {
  const ids = splitList(value);
  const invalid = ids.filter((id) => !/^\d+$/.test(id));
  if (ids.length === 0 || invalid.length > 0) {
    throw new UsageError(`Invalid policy IDs: ${value}`);
  }
  return ids;
}

const yesNo = (value: boolean): string => (value ? 'Yes' : 'No');

export function registerScannerCommands(program: Command, execute: Executor): void {
  const scanners = program.command('scanners').description('Enable, disable, or list a set of scanners');
  const scannerListHelp = `Comma separated list of scanner IDs and/or groups (${scannerGroupNames().join(', ')})`;

  scanners
    .command('list')
    .description('List the active scanners')
    .option('-s, --scanners <list>', `${scannerListHelp} to show`)
    .option('-p, --policy-id <id>', 'Only list scanners of this policy')
    .action((options: { scanners?: string; policyId?: string }) =>
      execute(async (ctx) => {
        const wanted = options.scanners === undefined ? undefined : resolveScannerSelection(options.scanners);
        const all = await ctx.client.listScanners(options.policyId);
        const shown = wanted ? all.filter((s) => wanted.has(s.id)) : all;

        const rows = shown.map((s) => [s.id, s.name, s.policyId, yesNo(s.enabled), s.attackStrength, s.alertThreshold]);
        const lines = renderGrid(['ID', 'Name', 'Policy ID', 'Enabled', 'Strength', 'Threshold'], rows);
        ctx.runtime.stdout.write(`${lines.join('\n')}\n`);
        return ExitCode.SUCCESS;
      })
    );

  scanners
    .command('enable')
    .description('Enable scanners')
    .requiredOption('-s, --scanners <list>', scannerListHelp)
    .action((options: { scanners: string }) =>
      execute(async (ctx) => {
        const ids = resolveScannerSelection(options.scanners);
        ctx.logger.info(`Enabling scanners with IDs ${[...ids].join(',')}`);
        await ctx.client.enableScanners(ids);
        return ExitCode.SUCCESS;
      })
    );

  scanners
    .command('disable')
    .description('Disable scanners')
    .requiredOption('-s, --scanners <list>', scannerListHelp)
    .action((options: { scanners: string }) =>
      execute(async (ctx) => {
        const ids = resolveScannerSelection(options.scanners);
        ctx.logger.info(`Disabling scanners with IDs ${[...ids].join(',')}`);
        await ctx.client.disableScanners(ids);
        return ExitCode.SUCCESS;
      })
    );

  const policies = program.command('policies').description('Enable or list a set of policies');

  policies
    .command('list')
    .description('List the active scan policies')
    .option('-p, --policy-ids <list>', 'Comma separated list of policy IDs to show')
    .action((options: { policyIds?: string }) =>
      execute(async (ctx) => {
        const wanted = options.policyIds === undefined ? undefined : new Set(resolvePolicyIds(options.policyIds));
        const all = await ctx.client.listPolicies();
        const shown = wanted ? all.filter((p) => wanted.has(p.id)) : all;

        const rows = shown.map((p) => [p.id, p.name, yesNo(p.enabled), p.attackStrength, p.alertThreshold]);
        const lines = renderGrid(['ID', 'Name', 'Enabled', 'Strength', 'Threshold'], rows);
        ctx.runtime.stdout.write(`${lines.join('\n')}\n`);
        return ExitCode.SUCCESS;
      })
    );

  policies
    .command('enable')
    .description('Enable only the given policies, disabling all others')
    .requiredOption('-p, --policy-ids <list>', 'Comma separated list of policy IDs to enable')
    .action((options: { policyIds: string }) =>
      execute(async (ctx) => {
        const ids = resolvePolicyIds(options.policyIds);
        ctx.logger.info(`Setting enabled policies to IDs ${ids.join(',')}`);
        await ctx.client.setEnabledPolicies(ids);
        return ExitCode.SUCCESS;
      })
    );
}
