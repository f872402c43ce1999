/**
 * CLI doctor command - graph diagnostics and repair.
 */

import { Command } from 'commander';
import { ExitCode } from '../../types/exit-codes.js';
import { PlotlineError } from '../../core/errors.js';
import { GraphDoctor, type IssueFilter, type IssueType } from '../../core/validation/doctor/index.js';
import { matchesFilter } from '../../core/validation/doctor/checks.js';
import { cliOutput } from '../renderers/index.js';
import { confirm } from '../prompt.js';
import { cancelled, commitItems, handleCommandError, loadItems, openWorkspace, resolveItem } from '../session.js';
import { optBool, optString } from '../options.js';

const ISSUE_TYPES: Record<string, IssueType> = {
  dangling: 'dangling_reference',
  dangling_reference: 'dangling_reference',
  incomplete: 'incomplete_chain',
  incomplete_chain: 'incomplete_chain',
};

function parseIssueType(value: string): IssueType {
  const type = ISSUE_TYPES[value.trim().toLowerCase().replace(/-/g, '_')];
  if (!type) {
    throw new PlotlineError(ExitCode.INVALID_INPUT, `Invalid issue type '${value}'`, {
      fix: 'Use dangling or incomplete',
    });
  }
  return type;
}

/**
 * Register the doctor command. Diagnosis never writes; --fix removes
 * dangling references after confirmation.
 */
export function registerDoctorCommand(program: Command): void {
  program
    .command('doctor')
    .description('Report dangling references and incomplete relation chains')
    .option('--fix', 'Remove dangling references')
    .option('--type <type>', 'Only issues of this type: dangling, incomplete')
    .option('--item <query>', 'Only issues on this item')
    .option('--dry-run', 'With --fix, show what would be removed')
    .option('-y, --yes', 'Skip the confirmation prompt')
    .action(async (opts: Record<string, unknown>) => {
      try {
        const session = await openWorkspace();
        const graph = await loadItems(session);

        const typeOpt = optString(opts, 'type');
        const itemOpt = optString(opts, 'item');
        const filter: IssueFilter = {
          ...(typeOpt !== undefined && { type: parseIssueType(typeOpt) }),
          ...(itemOpt !== undefined && { itemId: resolveItem(graph, itemOpt).id }),
        };
        const issues = new GraphDoctor(graph).fullDiagnosis().filter((issue) => matchesFilter(issue, filter));

        if (!optBool(opts, 'fix')) {
          cliOutput({ issues, dryRun: false }, { command: 'doctor' });
          return;
        }

        const dryRun = optBool(opts, 'dryRun');
        if (dryRun) {
          const fixed = new GraphDoctor(graph.copy()).fixIssues(filter);
          cliOutput({ issues, fixed, dryRun }, { command: 'doctor' });
          return;
        }

        const fixable = issues.filter((issue) => issue.type === 'dangling_reference').length;
        if (fixable > 0 && !(await confirm(`Remove ${fixable} dangling reference(s)?`, { yes: optBool(opts, 'yes') }))) {
          cancelled('doctor');
        }
        const fixed = new GraphDoctor(graph).fixIssues(filter);
        if (fixed.length > 0) await commitItems(session, graph);
        cliOutput({ issues, fixed, dryRun }, { command: 'doctor' });
      } catch (err) {
        handleCommandError(err, 'doctor');
      }
    });
}
