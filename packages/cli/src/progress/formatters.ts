/**
 * Output formatting utilities
 */

import chalk from 'chalk';

import type { ChesslensConfig } from '../config/schema.js';

/**
 * Format configuration for display
 */
export function formatConfigDisplay(config: ChesslensConfig): string {
  const lines: string[] = [];

  lines.push(chalk.bold('Configuration:'));
  lines.push('');

  // Engine
  lines.push(chalk.dim('Engine:'));
  if (config.engine.enabled) {
    const args = config.engine.args.length > 0 ? ` ${config.engine.args.join(' ')}` : '';
    lines.push(`  Command: ${config.engine.path}${args}`);
    lines.push(`  Threads: ${config.engine.threads}`);
    lines.push(`  Hash: ${config.engine.hashMb} MB`);
    lines.push(`  Multi-PV: ${config.engine.multiPv}`);
  } else {
    lines.push(`  ${chalk.yellow('disabled')}`);
  }
  lines.push('');

  // Analysis
  lines.push(chalk.dim('Analysis:'));
  lines.push(`  Profile: ${config.analysis.profile}`);
  lines.push(`  Depth: ${config.analysis.depth ?? 'unlimited'}`);
  lines.push(`  Move time: ${formatDuration(config.analysis.movetimeMs)}`);
  lines.push(`  Mate hunt: ${config.analysis.mateHunt ? chalk.green('on') : 'off'}`);
  lines.push('');

  // Display
  lines.push(chalk.dim('Display:'));
  lines.push(`  Orientation: ${config.display.orientation}`);
  lines.push(`  Unicode pieces: ${config.display.unicode}`);
  lines.push(`  Color: ${config.display.color}`);

  return lines.join('\n');
}

/**
 * Format a time duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.round((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/**
 * Format a count with thousands separators ("8,902")
 */
export function formatCount(count: number): string {
  return String(count).replace(/\B(?=(\d{3})+(?!\d))/g, ',');
}

/**
 * Format a rate per second ("1.2M/s", "950k/s", "12/s")
 */
export function formatRate(count: number, ms: number): string {
  if (ms <= 0) return '-';
  const perSecond = (count / ms) * 1000;
  if (perSecond >= 1_000_000) return `${(perSecond / 1_000_000).toFixed(1)}M/s`;
  if (perSecond >= 1000) return `${Math.round(perSecond / 1000)}k/s`;
  return `${Math.round(perSecond)}/s`;
}
