/**
 * Commander program definition: global flags, hooks and every command.
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { PlotlineConfig } from '../types/config.js';
import { DEFAULTS, loadConfig } from '../core/config.js';
import { errorMessage } from '../core/errors.js';
import { getLogger, initLogger } from '../core/logger.js';
import { getWorkspaceDir } from '../core/paths.js';
import { isWorkspaceInitialized } from '../store/workspace.js';
import { resolveFormat } from './middleware/output-format.js';
import { setFormatContext } from './format-context.js';
import { cliOutput } from './renderers/index.js';
import { configureColors } from './renderers/colors.js';
import { handleCommandError } from './session.js';

import { registerInitCommand } from './commands/init.js';
import { registerAddCommand } from './commands/add.js';
import { registerShowCommand } from './commands/show.js';
import { registerListCommand } from './commands/list.js';
import { registerSetStatusCommand } from './commands/set-status.js';
import { registerRelateCommand, registerUnrelateCommand } from './commands/relate.js';
import { registerInsertCommand } from './commands/insert.js';
import { registerRemoveCommand } from './commands/remove.js';
import { registerOccludeCommand, registerIncludeCommand } from './commands/occlude.js';
import { registerDoctorCommand } from './commands/doctor.js';
import { registerIncludesCommand } from './commands/includes.js';
import { registerCleanCommand } from './commands/clean.js';
import { registerLogCommand, registerLogsCommand } from './commands/log.js';
import { registerConfigCommand } from './commands/config.js';

const PackageJsonSchema = z.object({ version: z.string() });

/** Read version from package.json (single source of truth). */
export function getPackageVersion(): string {
  // src/cli/program.ts and dist/cli/program.js both sit two levels below the root
  const moduleRoot = join(dirname(fileURLToPath(import.meta.url)), '..', '..');
  try {
    const pkg = PackageJsonSchema.safeParse(JSON.parse(readFileSync(join(moduleRoot, 'package.json'), 'utf-8')));
    return pkg.success ? pkg.data.version : '0.0.0';
  } catch (err) {
    getLogger('cli').debug({ err: errorMessage(err) }, 'package.json unreadable');
    return '0.0.0';
  }
}

/**
 * Load configuration for the hooks. A broken config file must not stop
 * `config set` from repairing it, so failures fall back to the defaults.
 */
async function loadStartupConfig(): Promise<PlotlineConfig> {
  try {
    return await loadConfig();
  } catch (err) {
    getLogger('cli').warn({ err: errorMessage(err) }, 'Using default configuration');
    return DEFAULTS;
  }
}

/** Build the plotline program with every command registered. */
export function createProgram(): Command {
  const version = getPackageVersion();
  const program = new Command();

  program
    .name('plotline')
    .description('Plain-text planning with dependency graphs, constraints and session logs')
    .version(version)
    .option('--json', 'Output in JSON format')
    .option('--human', 'Output in human-readable format (default)')
    .option('--quiet', 'Suppress non-essential output for scripting');

  program
    .command('version')
    .description('Display plotline version')
    .action(() => {
      cliOutput({ version }, { command: 'version' });
    });

  registerInitCommand(program);
  registerAddCommand(program);
  registerShowCommand(program);
  registerListCommand(program);
  registerSetStatusCommand(program);
  registerRelateCommand(program);
  registerUnrelateCommand(program);
  registerInsertCommand(program);
  registerRemoveCommand(program);
  registerOccludeCommand(program);
  registerIncludeCommand(program);
  registerDoctorCommand(program);
  registerIncludesCommand(program);
  registerCleanCommand(program);
  registerLogCommand(program);
  registerLogsCommand(program);
  registerConfigCommand(program);

  // Resolve output format and start the file logger before any command runs.
  program.hook('preAction', async (_thisCommand, actionCommand) => {
    const config = await loadStartupConfig();
    configureColors(config.output.showColor);
    try {
      setFormatContext(resolveFormat(actionCommand.optsWithGlobals(), config.output.defaultFormat));
    } catch (err) {
      handleCommandError(err, actionCommand.name());
    }

    const dir = getWorkspaceDir();
    if (isWorkspaceInitialized(dir)) {
      initLogger(dir, config.logging);
    }
  });

  return program;
}
