import { Command } from 'commander';
import { errorMessage } from '../../engine/errors.js';
import { DEFAULT_RESULTS_DIR, ResultStore } from '../../store/result-store.js';
import { formatRunList, formatRunReport } from '../format.js';
import { formatError, icons, style } from '../theme.js';

interface ReportOptions {
  list?: boolean;
  json?: boolean;
  verbose?: boolean;
  resultsDir: string;
}

export const reportCommand = new Command('report')
  .description('Show stored run reports')
  .argument('[run-id]', 'Run to show; the latest when omitted')
  .option('--list', 'List the stored runs')
  .option('--json', 'Print the raw report')
  .option('-v, --verbose', 'Show every test case, not only the ones that need attention')
  .option('--results-dir <dir>', 'Where run reports are stored', DEFAULT_RESULTS_DIR)
  .addHelpText('after', `
${style.bold('Examples:')}
  ${style.command('casework report')}              ${style.dim('Show the latest run')}
  ${style.command('casework report --list')}       ${style.dim('List stored runs')}
  ${style.command('casework report <id> --json')}  ${style.dim('Print a run as JSON')}
`)
  .action(async (runId: string | undefined, options: ReportOptions) => {
    try {
      const store = new ResultStore(options.resultsDir);

      if (options.list) {
        const runs = await store.list();
        if (runs.length === 0) {
          console.log(`\n${style.warning(`${icons.warning} No stored runs.`)}\n`);
          return;
        }
        console.log(formatRunList(runs));
        return;
      }

      const report = runId ? await store.load(runId) : await store.getLatest();
      if (!report) {
        console.error(formatError(runId ? `Run not found: ${runId}` : 'No stored runs', [
          `Run ${style.command('casework report --list')} to see stored runs`,
          `Run ${style.command('casework test')} to create one`,
        ]));
        process.exit(1);
      }

      console.log(options.json ? JSON.stringify(report, null, 2) : formatRunReport(report, options.verbose ?? false));
    } catch (error) {
      console.error(formatError(errorMessage(error)));
      process.exit(1);
    }
  });
