#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { LOG_LEVELS, isLogLevel, setLogLevel } from '../utils/logger.js';
import { configCommand } from './commands/config.js';
import { debugCommand } from './commands/debug.js';
import { listCommand } from './commands/list.js';
import { reportCommand } from './commands/report.js';
import { testCommand } from './commands/test.js';
import { BANNER_MINIMAL, style } from './theme.js';

const program = new Command();

program
  .name('casework')
  .description(`${BANNER_MINIMAL}\n\nRuns test programs in isolation and classifies their results.`)
  .version('0.1.0')
  .option('--log-level <level>', `Diagnostics verbosity (${LOG_LEVELS.join(', ')})`, (value: string) => {
    if (!isLogLevel(value)) {
      throw new InvalidArgumentError(`Expected one of ${LOG_LEVELS.join(', ')}.`);
    }
    return value;
  })
  .configureHelp({
    sortSubcommands: true,
    subcommandTerm: (cmd) => style.command(cmd.name()) + ' ' + style.dim(cmd.usage()),
  })
  .hook('preAction', (thisCommand) => {
    const level: unknown = thisCommand.opts().logLevel;
    if (isLogLevel(level)) {
      setLogLevel(level);
    }
  })
  .addHelpText('afterAll', `
${style.bold('Examples:')}

  ${style.dim('# Run every test program listed in Testfile.yaml')}
  $ casework test

  ${style.dim('# Show what failed last time')}
  $ casework report

  ${style.dim('# Rerun one test case with its output on the terminal')}
  $ casework debug bin/math:add

${style.muted('For more info, run any command with --help')}
`);

program.addCommand(listCommand);
program.addCommand(testCommand);
program.addCommand(debugCommand);
program.addCommand(configCommand);
program.addCommand(reportCommand);

await program.parseAsync(process.argv);
