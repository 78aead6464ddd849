import { Command } from 'commander';
import { parseFilter } from '../../driver/index.js';
import { EngineError, errorMessage } from '../../engine/errors.js';
import { noopHooks } from '../../engine/hooks.js';
import { formatResult, isGoodResult } from '../../engine/result.js';
import { findTestCase } from '../../engine/test-program.js';
import { DEFAULT_MANIFEST } from '../../suite/manifest.js';
import { collect, loadSuite, type SuiteOptions } from '../options.js';
import { formatError, resultStyle, style } from '../theme.js';

interface DebugOptions extends SuiteOptions {
  stdout: string;
  stderr: string;
}

export const debugCommand = new Command('debug')
  .description('Run a single test case, sending its output to the given files')
  .argument('<filter>', 'The test case to run, as program:case')
  .option('-k, --testfile <file>', 'Suite manifest', DEFAULT_MANIFEST)
  .option('-c, --config <file>', 'Configuration file')
  .option('--variable <name=value>', 'Override a configuration variable', collect, [])
  .option('--stdout <file>', 'Where the test case\'s stdout goes', '/dev/stdout')
  .option('--stderr <file>', 'Where the test case\'s stderr goes', '/dev/stderr')
  .addHelpText('after', `
${style.bold('Examples:')}
  ${style.command('casework debug bin/math:add')}
  ${style.command('casework debug bin/math:add --stdout out.txt --stderr err.txt')}
`)
  .action(async (rawFilter: string, options: DebugOptions) => {
    try {
      const filter = parseFilter(rawFilter);
      if (filter.testCase === undefined) {
        throw new EngineError(`'${rawFilter}' does not name a single test case; use program:case`);
      }

      const { config, programs } = await loadSuite(options);
      const program = programs.find(p => p.binary === filter.programPath);
      if (!program) {
        throw new EngineError(`Unknown test program ${filter.programPath}`);
      }

      const testCase = await findTestCase(program, filter.testCase);
      const result = await testCase.debug(config, noopHooks, options.stdout, options.stderr);
      console.error(`${testCase.displayName}  ${style.dim('->')}  ${resultStyle[result.type](formatResult(result))}`);

      if (!isGoodResult(result)) {
        process.exit(1);
      }
    } catch (error) {
      console.error(formatError(errorMessage(error), [
        `Run ${style.command('casework list')} to see the available test cases`,
      ]));
      process.exit(1);
    }
  });
