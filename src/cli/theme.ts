/**
 * casework CLI theme
 * Colors, icons and the formatters shared by every command.
 */

import { RESULT_TYPES, type ResultType } from '../engine/result.js';

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',

  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',

  brightBlack: '\x1b[90m',
  brightBlue: '\x1b[94m',
  brightMagenta: '\x1b[95m',
  brightCyan: '\x1b[96m',
  brightYellow: '\x1b[93m',
};

const paint = (code: string) => (text: string) =>
  process.stdout.isTTY && !process.env.NO_COLOR ? `${code}${text}${colors.reset}` : text;

export const style = {
  bold: paint(colors.bold),
  dim: paint(colors.dim),

  success: paint(colors.green),
  error: paint(colors.red),
  warning: paint(colors.yellow),
  info: paint(colors.cyan),
  muted: paint(colors.brightBlack),

  primary: paint(colors.brightCyan),
  accent: paint(colors.brightMagenta),

  command: paint(`${colors.bold}${colors.cyan}`),
  path: paint(colors.brightBlue),
  number: paint(colors.brightYellow),
  label: paint(colors.dim),
};

export const icons = {
  success: '✓',
  error: '✗',
  warning: '⚠',
  bullet: '•',
  arrowRight: '▸',
  folder: '📁',
};

const box = {
  topLeft: '╭',
  topRight: '╮',
  bottomLeft: '╰',
  bottomRight: '╯',
  horizontal: '─',
  vertical: '│',
};

export const BANNER_MINIMAL = `${style.accent('casework')} ${style.muted('·')} ${style.dim('isolated test execution')}`;

export const resultStyle: Record<ResultType, (text: string) => string> = {
  passed: style.success,
  failed: style.error,
  broken: (text: string) => style.bold(style.error(text)),
  skipped: style.warning,
  expected_failure: style.info,
};

export const resultLabel: Record<ResultType, string> = {
  passed: 'Passed',
  failed: 'Failed',
  broken: 'Broken',
  skipped: 'Skipped',
  expected_failure: 'Expected failures',
};

export function section(title: string): string {
  return `\n${style.dim(box.horizontal.repeat(4))} ${style.bold(title)} ${style.dim(box.horizontal.repeat(Math.max(0, 34 - title.length)))}`;
}

export function keyValue(key: string, value: string | number, indent = 0): string {
  const pad = '  '.repeat(indent);
  return `${pad}${style.label(key + ':')} ${value}`;
}

export function bullet(text: string, indent = 0): string {
  const pad = '  '.repeat(indent);
  return `${pad}${style.dim(icons.bullet)} ${text}`;
}

// Result summary box
export function resultBox(counts: Record<ResultType, number>, duration?: number): string {
  const inner = 38;
  const row = (text: string, visibleLength: number) =>
    style.primary(`  ${box.vertical}`) + text + ' '.repeat(Math.max(0, inner - visibleLength)) + style.primary(box.vertical);
  const lines: string[] = [];

  lines.push(style.primary(`  ${box.topLeft}${box.horizontal.repeat(inner)}${box.topRight}`));
  lines.push(row(`   ${style.bold('Test Results')}`, 15));
  lines.push(row('', 0));

  let total = 0;
  for (const type of RESULT_TYPES) {
    const count = counts[type];
    total += count;
    if (count === 0 && type !== 'passed' && type !== 'failed') continue;
    const text = `   ${resultLabel[type].padEnd(18)} ${String(count).padStart(5)}`;
    lines.push(row(count > 0 ? resultStyle[type](text) : text, text.length));
  }

  const totalText = `   ${'Total'.padEnd(18)} ${String(total).padStart(5)}`;
  lines.push(row(style.dim(`   ${'─'.repeat(24)}`), 27));
  lines.push(row(totalText, totalText.length));

  if (duration !== undefined) {
    const durationText = `   ${'Duration'.padEnd(18)} ${formatDuration(duration).padStart(5)}`;
    lines.push(row(durationText, durationText.length));
  }

  lines.push(style.primary(`  ${box.bottomLeft}${box.horizontal.repeat(inner)}${box.bottomRight}`));
  return lines.join('\n');
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

// Error formatting with suggestions
export function formatError(message: string, suggestions?: string[]): string {
  const lines: string[] = [];
  lines.push(`\n${style.error(`${icons.error} Error:`)} ${message}`);

  if (suggestions && suggestions.length > 0) {
    lines.push('');
    lines.push(style.dim('  Suggestions:'));
    for (const suggestion of suggestions) {
      lines.push(`    ${style.dim(icons.arrowRight)} ${suggestion}`);
    }
  }

  lines.push('');
  return lines.join('\n');
}
