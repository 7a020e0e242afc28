// ============================================================================
// Terminal Output - 终端输出格式化
// ============================================================================

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { Capture, SearchResult, StatisticsSnapshot } from '../../shared/types';

export type LineWriter = (line: string) => void;

// ----------------------------------------------------------------------------
// Formatters
// ----------------------------------------------------------------------------

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local date and time, e.g. "📅 2025-01-01 ⏰ 12:00:00"
 */
export function formatTimestamp(epochMs: number): string {
  const date = new Date(epochMs);
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `📅 ${day} ⏰ ${time}`;
}

export function formatNumber(value: number): string {
  return value.toLocaleString('en-US');
}

export function scoreBadge(score: number): string {
  if (score >= 0.8) return '🟢';
  if (score >= 0.5) return '🟡';
  return '🟠';
}

/** Collapse whitespace so one capture prints on one line */
export function oneLine(text: string, max?: number): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  if (max !== undefined && flat.length > max) {
    return flat.substring(0, max) + '...';
  }
  return flat;
}

export function formatSearchResult(result: SearchResult, position: number): string[] {
  const header = `${position}. ${scoreBadge(result.relevanceScore)} [${result.appName}] Score: ${result.relevanceScore.toFixed(3)}`;
  return [
    chalk.bold(header) + chalk.dim(` (${result.matchType})`),
    chalk.dim(`   ${formatTimestamp(result.createdAt)}`),
    `   ${oneLine(result.snippet)}`,
  ];
}

export function formatSearchResults(query: string, results: SearchResult[]): string[] {
  if (results.length === 0) {
    return [
      chalk.red(`❌ No results found for '${query}'`),
      chalk.dim('💡 Try different search terms'),
    ];
  }

  const lines = [chalk.green(`✅ Found ${results.length} results:`)];
  results.forEach((result, i) => {
    lines.push('', ...formatSearchResult(result, i + 1));
  });
  return lines;
}

export function formatCapture(capture: Capture, preview = 100): string[] {
  return [
    chalk.cyan(`[${capture.appName}]`) + chalk.dim(` #${capture.id} ${formatTimestamp(capture.createdAt)}`),
    `   ${oneLine(capture.content, preview)}`,
  ];
}

export function formatCaptureList(title: string, captures: Capture[]): string[] {
  if (captures.length === 0) {
    return [chalk.yellow('No captures yet')];
  }
  const lines = [chalk.cyan.bold(title)];
  for (const capture of captures) {
    lines.push(...formatCapture(capture));
  }
  return lines;
}

export function formatStatistics(stats: StatisticsSnapshot): string[] {
  const lines = [
    chalk.cyan.bold('📊 Database Statistics:'),
    `   Total captures: ${formatNumber(stats.totalCaptures)}`,
    `   Unique apps: ${formatNumber(stats.uniqueApps)}`,
    `   Total characters: ${formatNumber(stats.totalCharacters)}`,
    `   Total words: ${formatNumber(stats.totalWords)}`,
  ];
  if (stats.topApps.length > 0) {
    lines.push('   Top apps:');
    for (const app of stats.topApps) {
      lines.push(`     ${app.appName}: ${formatNumber(app.captureCount)} captures`);
    }
  }
  return lines;
}

// ----------------------------------------------------------------------------
// Terminal Output
// ----------------------------------------------------------------------------

/**
 * 终端输出管理器
 */
export class TerminalOutput {
  private spinner: Ora | null = null;

  constructor(private readonly write: LineWriter = (line) => console.log(line)) {}

  lines(lines: string[]): void {
    for (const line of lines) {
      this.write(line);
    }
  }

  startSpinner(message: string): void {
    this.spinner = ora({
      text: chalk.dim(message),
      spinner: 'dots',
      stream: process.stderr,
    }).start();
  }

  succeedSpinner(message: string): void {
    if (this.spinner) {
      this.spinner.succeed(message);
      this.spinner = null;
    } else {
      this.success(message);
    }
  }

  failSpinner(message: string): void {
    if (this.spinner) {
      this.spinner.fail(message);
      this.spinner = null;
    } else {
      this.error(message);
    }
  }

  searchResults(query: string, results: SearchResult[]): void {
    this.lines(formatSearchResults(query, results));
  }

  captures(title: string, captures: Capture[]): void {
    this.lines(formatCaptureList(title, captures));
  }

  statistics(stats: StatisticsSnapshot): void {
    this.lines(formatStatistics(stats));
  }

  /**
   * 显示错误
   */
  error(message: string): void {
    console.error(chalk.red(`❌ Error: ${message}`));
  }

  warn(message: string): void {
    this.write(chalk.yellow(`⚠️  ${message}`));
  }

  info(message: string): void {
    this.write(chalk.blue(`ℹ️  ${message}`));
  }

  success(message: string): void {
    this.write(chalk.green(`✅ ${message}`));
  }
}

// 导出单例
export const terminalOutput = new TerminalOutput();
