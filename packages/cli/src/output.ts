/**
 * @arbor/cli — Result formatting.
 */

import chalk from "chalk";

export function formatVerdict(valid: boolean): string {
  return valid ? chalk.green("valid") : chalk.red("invalid");
}

export function formatFailures(codes: readonly string[]): string {
  return `${chalk.red("invalid")}: ${codes.join(", ")}`;
}
