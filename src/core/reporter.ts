/**
 * Report Generator
 *
 * Produces human-readable reports in multiple formats:
 * Console (colored), JSON, Markdown.
 */

import chalk from 'chalk';
import {
  ChangeSeverity,
  EvolutionReport,
  EvolutionTrack,
  ReportFormat,
  SchemaChange,
} from './types';
import { assertNever } from './errors';
import { severityRank } from './differ';
import { RATING_MESSAGES } from './scorer';

// ─── Severity Icons & Labels ────────────────────────────────────────────────

const SEVERITY_ICON: Record<ChangeSeverity, string> = {
  critical: '🔴',
  major: '🟡',
  minor: '🟢',
};

const SEVERITY_LABEL: Record<ChangeSeverity, string> = {
  critical: 'CRITICAL',
  major: 'MAJOR',
  minor: 'MINOR',
};

const SEVERITY_TITLE: Record<ChangeSeverity, string> = {
  critical: 'Critical',
  major: 'Major',
  minor: 'Minor',
};

const SEVERITY_COLOR: Record<ChangeSeverity, (text: string) => string> = {
  critical: chalk.red,
  major: chalk.yellow,
  minor: chalk.green,
};

export function formatPercent(score: number): string {
  return `${Math.round(score * 100)}%`;
}

function formatDelta(delta: number): string {
  if (delta === 0) return '0%';
  return `${delta > 0 ? '+' : ''}${(delta * 100).toFixed(1)}%`;
}

function scoreColor(score: number): string {
  const text = formatPercent(score);
  if (score >= 0.9) return chalk.green(text);
  if (score >= 0.7) return chalk.yellow(text);
  return chalk.red(text);
}

function bySeverity(changes: readonly SchemaChange[]): SchemaChange[] {
  return [...changes].sort((a, b) => severityRank(b.severity) - severityRank(a.severity));
}

// ─── Change Reports ─────────────────────────────────────────────────────────

/**
 * Format a change report in the specified format.
 */
export function formatReport(report: EvolutionReport, format: ReportFormat): string {
  switch (format) {
    case 'console':
      return formatConsole(report);
    case 'json':
      return JSON.stringify(report, null, 2);
    case 'markdown':
      return formatMarkdown(report);
    default:
      return assertNever(format);
  }
}

function formatConsole(report: EvolutionReport): string {
  const lines: string[] = [];
  const bar = '━'.repeat(50);

  lines.push('');
  lines.push(chalk.bold(`🔍 Schema Evolution Report: ${report.key}`));
  lines.push(chalk.gray(bar));

  if (report.changes.length === 0) {
    lines.push(chalk.green('  ✅ No schema changes detected'));
  } else {
    for (const change of bySeverity(report.changes)) {
      const label = SEVERITY_LABEL[change.severity].padEnd(8);
      lines.push(
        `${SEVERITY_ICON[change.severity]} ${SEVERITY_COLOR[change.severity](label)} ${change.description}`
      );
      if (change.isBreaking && change.impact) {
        lines.push(chalk.gray(`            ${change.impact}`));
      }
    }
  }

  lines.push(chalk.gray(bar));

  const { breaking, nonBreaking } = report.summary;
  lines.push(
    `Summary: ${chalk.red(`${breaking} breaking`)} | ${chalk.green(`${nonBreaking} non-breaking`)}`
  );
  lines.push(
    `Compatibility Score: ${scoreColor(report.compatibilityScore)} (${RATING_MESSAGES[report.rating]})`
  );
  lines.push('');

  return lines.join('\n');
}

function formatMarkdown(report: EvolutionReport): string {
  const lines: string[] = [];
  const breaking = report.changes.filter((c) => c.isBreaking);
  const nonBreaking = report.changes.filter((c) => !c.isBreaking);

  lines.push(`# Schema Evolution Analysis: ${report.key}`);
  lines.push('');
  lines.push(`**Timestamp:** ${report.timestamp}`);
  lines.push(`**Version:** v${report.previousVersion} → v${report.currentVersion}`);
  lines.push('');
  lines.push('## Change Summary');
  lines.push(`- **Total Changes:** ${report.summary.total}`);
  lines.push(`- **Breaking Changes:** ${report.summary.breaking}`);
  lines.push(`- **Non-Breaking Changes:** ${report.summary.nonBreaking}`);
  lines.push('');

  if (breaking.length > 0) {
    lines.push('## ⚠️ Breaking Changes');
    for (const c of breaking) {
      lines.push(`- **${SEVERITY_TITLE[c.severity]}**: ${c.description}`);
      if (c.impact) lines.push(`  - *Impact:* ${c.impact}`);
      if (c.recommendation) lines.push(`  - *Recommendation:* ${c.recommendation}`);
    }
    lines.push('');
  }

  if (nonBreaking.length > 0) {
    lines.push('## ✅ Non-Breaking Changes');
    for (const c of nonBreaking) {
      lines.push(`- **${SEVERITY_TITLE[c.severity]}**: ${c.description}`);
    }
    lines.push('');
  }

  if (report.suggestions.length > 0) {
    lines.push('## Migration Suggestions');
    for (const s of report.suggestions) {
      lines.push(`- ${s}`);
    }
    lines.push('');
  }

  lines.push(`## Compatibility Score: ${formatPercent(report.compatibilityScore)}`);
  lines.push(RATING_MESSAGES[report.rating]);

  return lines.join('\n');
}

// ─── Evolution Tracks ───────────────────────────────────────────────────────

function transitionLabel(track: EvolutionTrack, index: number): string {
  return `v${track.versions[index - 1]} → v${track.versions[index]}`;
}

/**
 * Format evolution metrics across a sequence of versions.
 */
export function formatEvolution(track: EvolutionTrack, format: ReportFormat): string {
  switch (format) {
    case 'console':
      return formatEvolutionConsole(track);
    case 'json':
      return JSON.stringify(track, null, 2);
    case 'markdown':
      return formatEvolutionMarkdown(track);
    default:
      return assertNever(format);
  }
}

function formatEvolutionConsole(track: EvolutionTrack): string {
  const lines: string[] = [];
  const bar = '━'.repeat(50);

  lines.push('');
  lines.push(chalk.bold(`📈 Schema Evolution: ${track.key}`));
  lines.push(chalk.gray(bar));

  for (const m of track.metrics) {
    lines.push(
      `  ${transitionLabel(track, m.index).padEnd(14)} ${chalk.red(`${m.breakingCount} breaking`)} | ${chalk.green(`${m.nonBreakingCount} non-breaking`)} | ${scoreColor(m.score)}`
    );
  }

  lines.push(chalk.gray(bar));
  const { summary } = track;
  lines.push(`Average Breaking Changes: ${summary.averageBreakingChanges.toFixed(1)}`);
  lines.push(`Average Compatibility: ${scoreColor(summary.averageScore)}`);
  lines.push(`Trend: ${summary.trend} (${formatDelta(summary.trendDelta)})`);
  lines.push('');

  return lines.join('\n');
}

function formatEvolutionMarkdown(track: EvolutionTrack): string {
  const lines: string[] = [];
  const { summary } = track;

  lines.push(`# Schema Evolution Tracking: ${track.key}`);
  lines.push('');
  lines.push('## Evolution Metrics');
  lines.push('| Version | Breaking Changes | Non-Breaking | Compatibility Score |');
  lines.push('|---------|------------------|--------------|---------------------|');
  for (const m of track.metrics) {
    lines.push(
      `| ${transitionLabel(track, m.index)} | ${m.breakingCount} | ${m.nonBreakingCount} | ${formatPercent(m.score)} |`
    );
  }
  lines.push('');

  lines.push('## Trends Analysis');
  lines.push(
    `- **Average Breaking Changes per Version:** ${summary.averageBreakingChanges.toFixed(1)}`
  );
  lines.push(`- **Average Compatibility Score:** ${formatPercent(summary.averageScore)}`);
  if (summary.transitions > 1) {
    const trend = summary.trend.charAt(0).toUpperCase() + summary.trend.slice(1);
    lines.push(`- **Compatibility Trend:** ${trend} (${formatDelta(summary.trendDelta)})`);
  }

  return lines.join('\n');
}
