/**
 * Interactive confirmation for destructive commands.
 */

import * as readline from 'node:readline';

/**
 * Ask a question via readline. The prompt goes to stderr so stdout stays
 * reserved for command output.
 */
export async function question(promptText: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stderr,
  });

  return new Promise((resolve) => {
    rl.question(promptText, (answer: string) => {
      rl.close();
      resolve(answer);
    });
  });
}

/** True when the answer is y/yes, case-insensitively. */
export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === 'y' || normalized === 'yes';
}

/**
 * Confirm a destructive action. `--yes` skips the prompt; without a TTY on
 * stdin the action is declined.
 */
export async function confirm(promptText: string, opts: { yes?: boolean } = {}): Promise<boolean> {
  if (opts.yes) return true;
  if (process.stdin.isTTY !== true) return false;
  return isAffirmative(await question(`${promptText} [y/N] `));
}
