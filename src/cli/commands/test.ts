import { Command } from 'commander';
import { randomUUID } from 'crypto';
import { reportIsGood, runSuite } from '../../driver/index.js';
import { errorMessage } from '../../engine/errors.js';
import { DEFAULT_RESULTS_DIR, ResultStore } from '../../store/result-store.js';
import { DEFAULT_MANIFEST } from '../../suite/manifest.js';
import { formatCaseLine, formatProgramError } from '../format.js';
import { collect, loadSuite, type SuiteOptions } from '../options.js';
import { formatError, icons, resultBox, style } from '../theme.js';

interface TestOptions extends SuiteOptions {
  store: boolean;
  resultsDir: string;
}

export const testCommand = new Command('test')
  .description('Run the test cases of the suite')
  .argument('[filters...]', 'Test programs or program:case pairs to run')
  .option('-k, --testfile <file>', 'Suite manifest', DEFAULT_MANIFEST)
  .option('-c, --config <file>', 'Configuration file')
  .option('--variable <name=value>', 'Override a configuration variable', collect, [])
  .option('--results-dir <dir>', 'Where run reports are stored', DEFAULT_RESULTS_DIR)
  .option('--no-store', 'Do not store the run report or the captured output')
  .addHelpText('after', `
${style.bold('Examples:')}
  ${style.command('casework test')}                               ${style.dim('Run the whole suite')}
  ${style.command('casework test bin/math:add')}                  ${style.dim('Run a single test case')}
  ${style.command('casework test --variable test_suites.math.fast=yes')}
`)
  .action(async (filters: string[], options: TestOptions) => {
    try {
      const { context, config, programs } = await loadSuite(options);
      const store = options.store ? new ResultStore(options.resultsDir) : undefined;
      const id = randomUUID();

      const report = await runSuite(programs, config, {
        id,
        context,
        filters,
        outputDir: store?.outputDir(id),
        onResult: result => console.log(formatCaseLine(result)),
        onProgramError: error => console.error(formatProgramError(error)),
      });

      for (const filter of report.unusedFilters) {
        console.error(style.warning(`No test cases matched by the filter '${filter}'`));
      }
      console.log('\n' + resultBox(report.summary, report.duration));

      if (store) {
        const file = await store.save(report);
        console.log(`\n${icons.folder} Report saved to: ${style.path(file)}`);
      }

      if (!reportIsGood(report) || report.unusedFilters.length > 0) {
        process.exit(1);
      }
    } catch (error) {
      console.error(formatError(errorMessage(error), [
        `Check that ${style.path(options.testfile)} exists and is valid`,
        `Inspect the configuration with ${style.command('casework config')}`,
      ]));
      process.exit(1);
    }
  });
