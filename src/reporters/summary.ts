import { promises as fs } from 'fs';
import path from 'path';
import type { ExecutiveSummary, ReportDigest } from '../summary.js';
import { band, BAND_COLORS } from '../utils/scoring.js';
import { renderSummaryWidget, STYLES } from './html.js';
import { escapeHtml as esc, fileStamp } from './shared.js';
import { totalsLine } from './text.js';

function renderDigest(r: ReportDigest): string {
  const failed = r.failedItems.length
    ? `<ul>${r.failedItems.map((t) => `<li>${esc(t)}</li>`).join('')}</ul>`
    : '<p class="sub">No failed checks.</p>';
  return `<section class="card report" data-status="${esc(r.status)}">
      <h3>${esc(r.title)}</h3>
      <table class="info-table">
        <tr><th>File</th><td>${esc(r.file)}</td></tr>
        <tr><th>Account</th><td>${esc(r.accountId)}</td></tr>
        <tr><th>Scope</th><td>${esc(r.scope)}</td></tr>
        <tr><th>Assessment Date</th><td>${esc(r.timestamp)}</td></tr>
        <tr><th>Status</th><td style="color:${BAND_COLORS[band(r.percentage)]}">${r.percentage}% ${esc(r.status)}</td></tr>
      </table>
      <h4>Top failed checks</h4>
      ${failed}
    </section>`;
}

export function renderSummaryHtml(summary: ExecutiveSummary): string {
  const skipped = summary.skipped.length
    ? `<section class="card"><h2>Skipped Files</h2><ul>${summary.skipped
        .map((s) => `<li>${esc(s.file)}: ${esc(s.reason)}</li>`)
        .join('')}</ul></section>`
    : '';
  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8"/>
  <meta name="viewport" content="width=device-width, initial-scale=1"/>
  <title>Executive Summary</title>
  <style>${STYLES}</style>
</head>
<body>
  <div class="page">
    <h1>Executive Summary</h1>
    <p class="sub">${summary.reports.length} report(s) · overall status: ${esc(summary.status)}</p>
    ${renderSummaryWidget(summary.counters, summary.percentage)}
    ${summary.reports.map(renderDigest).join('\n    ')}
    ${skipped}
    <footer class="sub">Generated ${esc(summary.generatedAt)}</footer>
  </div>
</body>
</html>
`;
}

export function renderSummaryText(summary: ExecutiveSummary): string {
  const lines = [
    'Executive Summary',
    `Generated: ${summary.generatedAt}`,
    `Reports: ${summary.reports.length}`,
    totalsLine(summary.counters),
    `Overall: ${summary.percentage}% ${summary.status}`,
  ];
  for (const r of summary.reports) {
    lines.push('', `${r.file}: ${r.percentage}% ${r.status}`);
    lines.push(...r.failedItems.map((t) => `  FAIL ${t}`));
  }
  for (const s of summary.skipped) {
    lines.push('', `SKIPPED ${s.file}: ${s.reason}`);
  }
  return lines.join('\n') + '\n';
}

export async function writeSummary(summary: ExecutiveSummary, outDir: string) {
  await fs.mkdir(outDir, { recursive: true });
  const baseName = `posture_summary_${fileStamp(new Date(summary.generatedAt))}`;
  const html = path.join(outDir, `${baseName}.html`);
  const text = path.join(outDir, `${baseName}.txt`);
  await fs.writeFile(html, renderSummaryHtml(summary), 'utf8');
  await fs.writeFile(text, renderSummaryText(summary), 'utf8');
  return { html, text };
}
