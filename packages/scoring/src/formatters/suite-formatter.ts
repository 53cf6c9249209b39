/**
 * Article suite formatter
 */

import type { BatchResult } from '../engine/article-benchmark.js';

function pct(score: number): string {
  return `${(score * 100).toFixed(1)}%`;
}

/**
 * Format a batch result as plain text, one line per family
 */
export function formatSuiteReport(batch: BatchResult): string {
  const lines: string[] = [];

  lines.push(`## Benchmark Suite`);
  lines.push(`- Articles: ${batch.articles.length}`);
  lines.push(`- Failed: ${batch.failedCount}`);
  lines.push(`- Mean Score: ${pct(batch.meanScore)}`);

  for (const article of batch.articles) {
    lines.push('');
    lines.push(`### ${article.articleId}: ${pct(article.totalScore)}`);
    if (article.error) {
      lines.push(`- failed: ${article.error}`);
      continue;
    }
    for (const family of Object.values(article.families)) {
      if (!family) continue;
      if (family.status === 'skipped') {
        lines.push(`- ${family.family}: skipped`);
      } else if (family.status === 'failed') {
        lines.push(`- ${family.family}: failed (${family.error ?? 'unknown error'})`);
      } else {
        const samples = family.report?.total_samples ?? 0;
        lines.push(`- ${family.family}: ${pct(family.score)} (${samples} matched)`);
      }
    }
  }

  return lines.join('\n');
}
