import { Command } from 'commander';
import { listSuite } from '../../driver/index.js';
import { errorMessage } from '../../engine/errors.js';
import { DEFAULT_MANIFEST } from '../../suite/manifest.js';
import { formatListedTestCase, formatProgramError } from '../format.js';
import { collect, loadSuite, type SuiteOptions } from '../options.js';
import { formatError, style } from '../theme.js';

interface ListOptions extends SuiteOptions {
  verbose?: boolean;
}

export const listCommand = new Command('list')
  .description('List the test cases of the suite')
  .argument('[filters...]', 'Test programs or program:case pairs to list')
  .option('-k, --testfile <file>', 'Suite manifest', DEFAULT_MANIFEST)
  .option('-c, --config <file>', 'Configuration file')
  .option('--variable <name=value>', 'Override a configuration variable', collect, [])
  .option('-v, --verbose', 'Show the properties of every test case')
  .addHelpText('after', `
${style.bold('Examples:')}
  ${style.command('casework list')}                    ${style.dim('List every test case')}
  ${style.command('casework list bin/math')}           ${style.dim('List the cases of one program')}
  ${style.command('casework list -v bin/math:add')}    ${style.dim('Show one case with its properties')}
`)
  .action(async (filters: string[], options: ListOptions) => {
    try {
      const { programs } = await loadSuite(options);
      const listing = await listSuite(programs, filters);

      for (const listed of listing.testCases) {
        console.log(formatListedTestCase(listed, options.verbose ?? false));
      }
      for (const error of listing.errors) {
        console.error(formatProgramError(error));
      }
      for (const filter of listing.unusedFilters) {
        console.error(style.warning(`No test cases matched by the filter '${filter}'`));
      }

      if (listing.errors.length > 0 || listing.unusedFilters.length > 0) {
        process.exit(1);
      }
    } catch (error) {
      console.error(formatError(errorMessage(error), [
        `Check that ${style.path(options.testfile)} exists and is valid`,
      ]));
      process.exit(1);
    }
  });
