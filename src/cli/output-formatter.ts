/**
 * Presentation for CLI results (chalk). Commands never print.
 */

import chalk from 'chalk';
import type { CliResult, CliOutput } from './types/cli-result.js';

export function formatOutput(output: CliOutput, isError: boolean = false): string {
  const lines: string[] = [];

  lines.push(isError ? chalk.red(`❌ ${output.message}`) : chalk.green(`✅ ${output.message}`));

  if (output.details && output.details.length > 0) {
    lines.push('');
    for (const detail of output.details) {
      lines.push(chalk.white(`  • ${detail}`));
    }
  }

  if (output.warnings && output.warnings.length > 0) {
    lines.push('');
    lines.push(chalk.yellow('⚠️  Warnings:'));
    for (const warning of output.warnings) {
      lines.push(chalk.yellow(`  • ${warning}`));
    }
  }

  if (output.suggestions && output.suggestions.length > 0) {
    lines.push('');
    lines.push(chalk.gray('💡 Suggestions:'));
    for (const suggestion of output.suggestions) {
      lines.push(chalk.gray(`  • ${suggestion}`));
    }
  }

  return lines.join('\n');
}

export function formatResult(result: CliResult): string {
  switch (result.kind) {
    case 'success':
      return result.output ? formatOutput(result.output, false) : '';
    case 'failure':
      return formatOutput(result.output, true);
  }
}

/**
 * Success goes to stdout, failure to stderr.
 */
export function printResult(result: CliResult): void {
  const formatted = formatResult(result);
  if (!formatted) return;

  if (result.kind === 'failure') {
    console.error(formatted);
  } else {
    console.log(formatted);
  }
}

/**
 * `1536` → `1.5 KiB`. Whole bytes below 1 KiB.
 */
export function formatBytes(bytes: number): string {
  const units = ['KiB', 'MiB', 'GiB', 'TiB'];
  if (bytes < 1024) return `${bytes} B`;

  let value = bytes;
  let unit = 'B';
  for (const next of units) {
    if (value < 1024) break;
    value /= 1024;
    unit = next;
  }
  return `${value.toFixed(1)} ${unit}`;
}
