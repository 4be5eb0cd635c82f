// src/utils/logger.ts
// Console output for the CLI. The analysis pipeline never logs; it reports
// through metadata.warnings and recommendations.

import chalk from "chalk";
import ora, { Ora } from "ora";

const ROW_WIDTH = 22;
const RULE_WIDTH = 60;

// ─── Levels ───────────────────────────────────────────────────────────────────

export function log(message: string): void {
  console.log(`${chalk.cyan("›")} ${message}`);
}

export function info(message: string): void {
  console.log(`  ${chalk.white(message)}`);
}

export function detail(message: string): void {
  console.log(`    ${chalk.gray(message)}`);
}

export function success(message: string): void {
  console.log(`${chalk.green("✔")} ${chalk.green(message)}`);
}

export function warn(message: string): void {
  console.warn(`${chalk.yellow("!")} ${chalk.yellow(message)}`);
}

export function error(message: string): void {
  console.error(`${chalk.red("✖")} ${chalk.red(message)}`);
}

export function debug(message: string): void {
  if (process.env["DEBUG"] === "true") {
    console.log(chalk.gray(`  debug  ${message}`));
  }
}

// ─── Layout ───────────────────────────────────────────────────────────────────

/** One-line program header: name, version and what it produces. */
export function header(version: string): void {
  console.log();
  console.log(`${chalk.bold.cyan("pom-blueprint")} ${chalk.gray(`v${version}`)}  ${chalk.white("script → page-object blueprint")}`);
  console.log(chalk.gray("═".repeat(RULE_WIDTH)));
}

export function step(n: number, total: number, label: string): void {
  console.log(`\n${chalk.bold.cyan(`${n}/${total}`)} ${chalk.bold.white(label)}`);
}

/** Titled rule opening a block of rows. */
export function section(title: string): void {
  const lead = `── ${title} `;
  console.log(chalk.gray(lead + "─".repeat(Math.max(4, RULE_WIDTH - lead.length))));
}

export function divider(): void {
  console.log(chalk.gray("─".repeat(RULE_WIDTH)));
}

export function row(label: string, value: string): void {
  console.log(`  ${chalk.gray(label.padEnd(ROW_WIDTH))} ${chalk.white(value)}`);
}

/** Fragility score coloured by band: stable, borderline, fragile. */
export function fragilityBadge(score: number, threshold: number): string {
  const text = String(score);
  if (score <= threshold) return chalk.green(text);
  if (score <= 70) return chalk.yellow(text);
  return chalk.red(text);
}

export function analysisWarning(code: string, message: string): void {
  console.warn(chalk.yellow(`  ! ${code}: ${message}`));
}

// ─── Spinner ──────────────────────────────────────────────────────────────────

export function spinner(message: string): Ora {
  return ora({ text: message, color: "cyan" }).start();
}
