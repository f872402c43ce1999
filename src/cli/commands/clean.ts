/**
 * CLI clean command - prune numbered backups of the workspace files.
 */

import { Command } from 'commander';
import { cleanBackups } from '../../store/backup.js';
import { cliOutput } from '../renderers/index.js';
import { confirm } from '../prompt.js';
import { cancelled, handleCommandError, openWorkspace } from '../session.js';
import { optBool, optString, parseCount } from '../options.js';

export function registerCleanCommand(program: Command): void {
  program
    .command('clean')
    .description('Delete old backups, keeping the newest per file')
    .option('--keep <n>', 'Backups to keep per file (default: backup.keep)')
    .option('--dry-run', 'Show what would be deleted')
    .option('-y, --yes', 'Skip the confirmation prompt')
    .action(async (opts: Record<string, unknown>) => {
      try {
        const session = await openWorkspace();
        const keepOpt = optString(opts, 'keep');
        const keep = keepOpt !== undefined ? parseCount(keepOpt, '--keep') : session.config.backup.keep;
        const { paths } = session;
        const files = [
          paths.items, paths.occludeItems,
          paths.metadata, paths.occludeMetadata,
          paths.logs, paths.occludeLogs,
        ];

        const candidates = await cleanBackups(files, keep, { dryRun: true });
        const dryRun = optBool(opts, 'dryRun');
        if (dryRun || candidates.length === 0) {
          cliOutput({ removed: candidates, keep, dryRun }, { command: 'clean' });
          return;
        }

        if (!(await confirm(`Delete ${candidates.length} backup(s)?`, { yes: optBool(opts, 'yes') }))) {
          cancelled('clean');
        }
        const removed = await cleanBackups(files, keep);
        cliOutput({ removed, keep, dryRun }, { command: 'clean' });
      } catch (err) {
        handleCommandError(err, 'clean');
      }
    });
}
