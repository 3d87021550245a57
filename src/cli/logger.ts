/**
 * Terminal rendering for the CLI: banner, spinners and pipeline output.
 */

import chalk from 'chalk';
import ora from 'ora';
import boxen from 'boxen';
import gradient from 'gradient-string';
import type { AnalysisResult, ColumnInfo, VisualizationConfig } from '../types/models.js';

const brand = gradient(['#7F5AF0', '#2CB1BC']);
const RULE_WIDTH = 60;

export function printBanner(): void {
  console.log('');
  console.log(`  ${brand.multiline('groundql')}  ${chalk.gray('questions in, validated SQL out')}`);
  console.log('');
}

export function spinner(text: string): ReturnType<typeof ora> {
  return ora({ text, color: 'magenta', spinner: 'dots' }).start();
}

export function success(message: string): void {
  console.log(chalk.green(`✔ ${message}`));
}

export function warn(message: string): void {
  console.log(chalk.yellow(`⚠ ${message}`));
}

/**
 * A failure line with hints indented underneath.
 */
export function error(message: string, hints: string[] = []): void {
  console.log(chalk.red(`✖ ${message}`));
  hints.forEach((hint) => console.log(chalk.dim(`    ${hint}`)));
}

/**
 * Generated SQL between two rules, keywords highlighted.
 */
export function sql(statement: string): void {
  const rule = chalk.gray('─'.repeat(RULE_WIDTH));
  const highlighted = statement.replace(
    /\b(SELECT|FROM|WHERE|GROUP BY|ORDER BY|HAVING|LIMIT|JOIN|ON|AS|AND|OR)\b/gi,
    (keyword) => chalk.magenta(keyword.toUpperCase())
  );
  console.log(rule);
  console.log(highlighted);
  console.log(rule);
}

export function failure(message: string, category: string | null): void {
  error(`${message} ${chalk.gray(`[${category ?? 'UNKNOWN'}]`)}`);
}

export function analysis(result: AnalysisResult): void {
  const sections: Array<[string, string[]]> = [
    ['Insights', result.insights],
    ['Trends', result.trends],
    ['Anomalies', result.anomalies],
    ['Recommendations', result.recommendations],
  ];
  const body = [
    result.summary,
    ...sections
      .filter(([, items]) => items.length > 0)
      .map(([heading, items]) => `\n${chalk.bold(heading)}\n${items.map((i) => `• ${i}`).join('\n')}`),
  ].join('\n');

  console.log(
    boxen(body, {
      padding: 1,
      margin: { top: 1, bottom: 1, left: 0, right: 0 },
      borderStyle: 'round',
      borderColor: 'magenta',
      title: 'Analysis',
    })
  );
}

export function chart(config: VisualizationConfig): void {
  const axes = config.x_axis ? ` x=${config.x_axis} y=${config.y_axis.join(',') || '-'}` : '';
  console.log(chalk.cyan(`◆ ${config.chart_type} chart: ${config.title}${chalk.gray(axes)}`));
}

export function table(name: string, columns: ColumnInfo[]): void {
  const listed = columns.map((c) => `${c.name} ${chalk.dim(c.dataType)}`).join(chalk.gray(', '));
  console.log(`${chalk.bold(name)}  ${listed}`);
}

export function link(text: string, url: string): void {
  console.log(`  ${text}: ${chalk.underline(url)}`);
}
