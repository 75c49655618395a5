/**
 * Terminal output helpers.
 *
 * Commands write through an Output so tests can capture the lines.
 */

import chalk from "chalk";

export interface Output {
  line(text?: string): void;
  error(text: string): void;
}

export const consoleOutput: Output = {
  line: (text = "") => console.log(text),
  error: (text) => console.error(text),
};

export function ok(out: Output, message: string): void {
  out.line(chalk.green("  ✓ ") + chalk.white(message));
}

export function info(out: Output, label: string, value: string): void {
  out.line(chalk.gray("    → ") + chalk.gray(label.padEnd(14)) + chalk.white(value));
}

export function warn(out: Output, message: string): void {
  out.line(chalk.yellow("  ! ") + chalk.yellow(message));
}

export function fail(out: Output, message: string): void {
  out.error(chalk.red("  ✗ ") + chalk.red(message));
}

export function heading(out: Output, title: string): void {
  out.line();
  out.line(chalk.cyan.bold(`  ${title}`));
}
