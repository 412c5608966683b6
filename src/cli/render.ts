import { MetricsSummary, Translation } from '../types/index.js';

export const BOX_WIDTH = 68;
const WRAP_WIDTH = 64;

const rule = (char: string): string => char.repeat(BOX_WIDTH);

function center(text: string): string {
  const left = Math.max(0, Math.floor((BOX_WIDTH - text.length) / 2));
  return (' '.repeat(left) + text).padEnd(BOX_WIDTH);
}

function row(content: string): string {
  return `║${content.padEnd(BOX_WIDTH)}║`;
}

export function banner(...titles: string[]): string[] {
  return [
    `╔${rule('═')}╗`,
    ...titles.map(title => `║${center(title)}║`),
    `╚${rule('═')}╝`
  ];
}

/**
 * A titled box; every body line is padded to the box width
 */
export function section(title: string, body: string[]): string[] {
  const head = `┌─ ${title} `;
  return [
    head + '─'.repeat(Math.max(0, BOX_WIDTH + 1 - head.length)) + '┐',
    ...body.map(line => `│ ${line.padEnd(BOX_WIDTH - 2)} │`),
    `└${rule('─')}┘`
  ];
}

/**
 * Greedy word wrap. A word longer than the width gets a line of its own.
 */
export function wrapText(text: string, width: number = WRAP_WIDTH): string[] {
  const lines: string[] = [];
  let line = '';

  for (const word of text.split(/\s+/).filter(Boolean)) {
    if (line && (line + word).length > width) {
      lines.push(line.trim());
      line = '';
    }
    line += word + ' ';
  }

  if (line.trim()) {
    lines.push(line.trim());
  }
  return lines;
}

export function renderOriginal(text: string): string[] {
  return section('Original Query', text.split('\n'));
}

export function renderTranslation(translation: Translation): string[] {
  const lines = section('English Translation', [
    `Confidence: ${translation.confidence.toFixed(1)}%`,
    ...translation.englishText.split('\n')
  ]);
  // divider between the confidence line and the text
  lines.splice(2, 0, `├${rule('─')}┤`);
  return lines;
}

export function renderReply(reply: string): string[] {
  return section('Support Response', wrapText(reply));
}

export function renderSummary(summary: MetricsSummary | null): string[] {
  if (!summary) {
    return ['', 'No queries processed yet.', ''];
  }

  return [
    `╔${rule('═')}╗`,
    `║${center('TRANSLATION METRICS SUMMARY')}║`,
    `╠${rule('═')}╣`,
    row(`  Total Queries: ${summary.totalQueries}`),
    row(`  Session Duration: ${summary.sessionDurationSeconds}s`),
    `╠${rule('═')}╣`,
    row('  Language Distribution:'),
    ...summary.languageCounts.map(({ language, count }) => row(`    • ${language}: ${count} queries`)),
    `╠${rule('═')}╣`,
    row(`  Avg Translation Confidence: ${summary.averageConfidence.toFixed(1)}%`),
    row(`  Avg Response Time: ${summary.averageLatencySeconds.toFixed(2)}s`),
    `╚${rule('═')}╝`,
    ''
  ];
}
