/**
 * Terminal output for the dugout CLI. Diagnostics go to stdout, failures
 * to stderr.
 */

import chalk from 'chalk';
import ora from 'ora';
import type { Ora } from 'ora';

const RULE = chalk.gray('─'.repeat(50));

export function failure(message: string, hint?: string): void {
  console.error(`${chalk.red('✖')} ${message}`);
  if (hint) {
    console.error(`  ${chalk.yellow('→')} ${chalk.dim(hint)}`);
  }
}

export function hint(message: string): void {
  console.error(`${chalk.blue('ℹ')} ${chalk.dim(message)}`);
}

/**
 * Spinner shown while a question is answered. Written to stderr so that
 * `--raw` output stays clean JSON.
 */
export function thinking(text: string): Ora {
  return ora({ text, color: 'cyan', stream: process.stderr }).start();
}

export function heading(title: string): void {
  console.log(`\n${chalk.cyan.bold(title)}\n${RULE}`);
}

/**
 * One labelled diagnostic value; `found` marks whether the pipeline
 * detected anything for it.
 */
export function field(label: string, value: string, found = true): void {
  const mark = found ? chalk.green('●') : chalk.gray('○');
  console.log(`  ${mark} ${chalk.bold(label.padEnd(14))} ${found ? chalk.cyan(value) : chalk.gray(value)}`);
}

export function planLines(lines: readonly string[]): void {
  for (const line of lines) {
    const [key, ...rest] = line.split(': ');
    console.log(rest.length > 0 ? `  ${chalk.dim(`${key}:`)} ${rest.join(': ')}` : `  ${line}`);
  }
  console.log(RULE);
}
