import { Command } from 'commander';
import chalk from 'chalk';
import * as out from '../output.js';
import { $try } from '../helpers.js';
import type { SessionProvider } from '../types.js';

export function createStatusCommand(getSession: SessionProvider): Command {
  return new Command('status')
    .description('Show the tasks file location and task counts')
    .action(() => $try(() => {
      const session = getSession();
      const stats = session.stats();

      out.info(`File: ${chalk.bold(session.filePath)}`);
      out.info(`${stats.total} tasks: ${stats.pending} pending, ${stats.done} done`);

      const report = session.loadReport;
      if (report.type === 'unreadable') {
        out.warning(`Could not read tasks file: ${report.message}`);
      } else if (report.skipped > 0) {
        out.warning(`Skipped ${report.skipped} unreadable line(s)`);
      }
    }));
}
