import { Command } from 'commander';
import { errorMessage } from '../../engine/errors.js';
import { formatConfig } from '../format.js';
import { collect, resolveConfig, type ConfigOptions } from '../options.js';
import { formatError, style } from '../theme.js';

export const configCommand = new Command('config')
  .description('Print the effective configuration')
  .option('-c, --config <file>', 'Configuration file')
  .option('--variable <name=value>', 'Override a configuration variable', collect, [])
  .addHelpText('after', `
${style.bold('Examples:')}
  ${style.command('casework config')}
  ${style.command('casework config --variable platform=freebsd')}
`)
  .action((options: ConfigOptions) => {
    try {
      console.log(formatConfig(resolveConfig(options)));
    } catch (error) {
      console.error(formatError(errorMessage(error)));
      process.exit(1);
    }
  });
