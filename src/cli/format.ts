import type { Config } from '../engine/config.js';
import type { ListedTestCase, ProgramError, RunReport, TestCaseReport } from '../driver/types.js';
import { formatResult } from '../engine/result.js';
import type { RunListItem } from '../store/result-store.js';
import {
  bullet,
  formatDuration,
  icons,
  keyValue,
  resultBox,
  resultStyle,
  section,
  style,
} from './theme.js';

export function formatCaseLine(report: TestCaseReport): string {
  const name = `${report.program}:${report.testCase}`;
  const outcome = resultStyle[report.result.type](formatResult(report.result));
  return `${name}  ${style.dim('->')}  ${outcome}  ${style.muted(`[${formatDuration(report.duration)}]`)}`;
}

export function formatProgramError(error: ProgramError): string {
  return `${style.error(icons.error)} ${style.path(error.program)}: ${error.message}`;
}

export function formatListedTestCase(listed: ListedTestCase, verbose: boolean): string {
  const line = `${listed.program}:${listed.testCase.name}`;
  if (!verbose) {
    return line;
  }
  const lines = [
    `${style.bold(line)} ${style.muted(`(${listed.testSuite}, ${listed.interfaceName})`)}`,
  ];
  const properties = Object.entries(listed.testCase.allProperties()).sort(([a], [b]) => a.localeCompare(b));
  for (const [key, value] of properties) {
    lines.push(keyValue(key, value, 1));
  }
  return lines.join('\n');
}

export function formatRunReport(report: RunReport, verbose = false): string {
  const lines: string[] = [];

  lines.push(section('Run'));
  lines.push(keyValue('Id', report.id, 1));
  lines.push(keyValue('Started', report.startedAt, 1));
  lines.push(keyValue('Directory', style.path(report.context.cwd), 1));
  lines.push(keyValue('Architecture', report.config.architecture, 1));
  lines.push(keyValue('Platform', report.config.platform, 1));

  const notable = verbose ? report.results : report.results.filter(r => r.result.type !== 'passed');
  if (notable.length > 0) {
    lines.push(section(verbose ? 'Test cases' : 'Test cases needing attention'));
    for (const result of notable) {
      lines.push(bullet(formatCaseLine(result), 1));
      if (verbose && result.stdoutPath) {
        lines.push(keyValue('stdout', style.path(result.stdoutPath), 3));
      }
      if (verbose && result.stderrPath) {
        lines.push(keyValue('stderr', style.path(result.stderrPath), 3));
      }
    }
  }

  if (report.errors.length > 0) {
    lines.push(section('Errors'));
    for (const error of report.errors) {
      lines.push(`  ${formatProgramError(error)}`);
    }
  }

  if (report.unusedFilters.length > 0) {
    lines.push(section('Unused filters'));
    for (const filter of report.unusedFilters) {
      lines.push(bullet(style.warning(filter), 1));
    }
  }

  lines.push('');
  lines.push(resultBox(report.summary, report.duration));
  lines.push('');
  return lines.join('\n');
}

export function formatRunList(runs: RunListItem[]): string {
  const lines: string[] = [section('Stored runs')];
  for (const run of runs) {
    const status = run.good ? style.success(icons.success) : style.error(icons.error);
    const counts = `${run.summary.total} cases, ${run.summary.failed} failed, ${run.summary.broken} broken`;
    lines.push(`  ${status} ${run.id}  ${style.muted(run.startedAt)}  ${counts}  ${style.muted(formatDuration(run.duration))}`);
  }
  lines.push('');
  return lines.join('\n');
}

/** Renders the configuration as `name = value` lines, the syntax `--variable` takes. */
export function formatConfig(config: Config): string {
  const lines = [
    `architecture = ${config.architecture}`,
    `platform = ${config.platform}`,
  ];
  if (config.testSuite !== undefined) {
    lines.push(`test_suite = ${config.testSuite}`);
  }
  for (const suite of Object.keys(config.testSuites).sort()) {
    const variables = config.testSuites[suite];
    for (const name of Object.keys(variables).sort()) {
      lines.push(`test_suites.${suite}.${name} = ${variables[name]}`);
    }
  }
  return lines.join('\n');
}
