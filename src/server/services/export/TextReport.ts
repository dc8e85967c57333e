import type { Result } from '../../types/deep-search.js';
import { round } from '../analysis/textUtils.js';

const RULE = '='.repeat(80);

/**
 * Human-readable summary of a Result, as printed by the CLI
 */
export function formatTextReport(result: Result): string {
  const { insights, stats } = result;
  const lines: string[] = [RULE, `Query: ${result.query}`, RULE, ''];

  lines.push('INSIGHTS:');
  lines.push(`  Overall Credibility: ${round(insights.overallCredibility)}`);
  lines.push(`  Key Topics: ${insights.keyTopics.slice(0, 5).map((topic) => topic.phrase).join(', ')}`);
  lines.push(`  Consensus Themes: ${insights.consensusThemes.join(', ')}`);
  lines.push(`  Top Sources: ${insights.topSources.length}`);
  lines.push(
    `  Languages: ${Object.entries(insights.languageDistribution)
      .map(([language, count]) => `${language} (${count})`)
      .join(', ')}`
  );
  lines.push(
    `  Fetched ${stats.fetched}/${stats.fetchAttempted}, skipped ${stats.skipped}, failed ${stats.failed}` +
      (result.cancelled ? ' (cancelled)' : '')
  );
  lines.push('');

  result.results.forEach((entry, index) => {
    lines.push(`[${index + 1}] ${entry.hit.title || '(no title)'}`);
    lines.push(`    URL: ${entry.hit.url}`);

    const { status } = entry.outcome;
    if (status.kind !== 'fetched') {
      lines.push(`    Status: ${status.kind} (${status.reason})`);
    }

    const analysis = entry.analysis;
    if (analysis) {
      lines.push(`    Credibility: ${round(analysis.credibility)} | Words: ${analysis.document.wordCount}`);
      lines.push(`    Sentiment: ${analysis.sentiment.label} (polarity: ${round(analysis.sentiment.polarity)})`);
      if (analysis.keyphrases.length > 0) {
        lines.push(`    Key Phrases: ${analysis.keyphrases.slice(0, 5).map((kp) => kp.phrase).join(', ')}`);
      }
    }
    lines.push('');
  });

  return lines.join('\n');
}
