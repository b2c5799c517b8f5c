// src/reporters/html.ts
import { promises as fs } from 'fs';
import path from 'path';
import type { CheckItem, Counters, FinalizedReport, RichText, Section } from '../types.js';
import { band, BAND_COLORS, percentage } from '../utils/scoring.js';
import { escapeHtml as esc, OUTCOME_GLYPH, OUTCOME_LABEL, richToLines } from './shared.js';

export const STYLES = `
    :root{
      --bg:#f4f6fb; --card:#fff; --ink:#0f172a; --muted:#475569; --line:#e2e8f0;
      --pass:#16a34a; --fail:#ef4444; --warning:#f59e0b; --info:#38bdf8; --denied:#7c3aed;
    }
    *{box-sizing:border-box}
    body{margin:0;font-family:Inter,system-ui,Segoe UI,Roboto,Helvetica,Arial,sans-serif;color:var(--ink);background:var(--bg)}
    .page{max-width:1120px;margin:0 auto;padding:40px 24px 64px}
    .menu{display:flex;flex-wrap:wrap;justify-content:flex-end;gap:10px;margin-bottom:12px;align-items:center}
    .menu button,.menu input[type=search],.menu .checkline{font-size:12px;border-radius:10px;border:1px solid #cbd5e1;background:#fff;color:var(--ink)}
    .menu button{appearance:none;padding:8px 12px;cursor:pointer}
    .menu input[type=search]{padding:8px 10px;min-width:220px;outline:none}
    .menu .checkline{display:inline-flex;align-items:center;gap:6px;padding:6px 8px}
    h1{font-size:32px;font-weight:800;letter-spacing:-0.3px;margin:8px 0 20px}
    .card{background:var(--card);border-radius:16px;padding:24px;box-shadow:0 8px 18px #00000012,inset 0 0 0 1px #00000008}
    .card + .card{margin-top:20px}
    .info-table{border-collapse:collapse;width:100%;font-size:14px}
    .info-table th{text-align:left;width:200px;color:var(--muted);font-weight:600;padding:6px 0}
    .info-table td{padding:6px 0}
    .stats{display:grid;grid-template-columns:repeat(4,minmax(0,1fr));gap:12px;margin:12px 0}
    .stat{border:1px solid var(--line);border-radius:12px;padding:12px;text-align:center}
    .stat b{display:block;font-size:28px}
    .stat-passed b{color:var(--pass)}.stat-failed b{color:var(--fail)}.stat-warning b{color:var(--warning)}
    .score{font-size:40px;font-weight:800}
    .bar{height:16px;border-radius:10px;overflow:hidden;background:#e6edf9}
    .bar-fill{height:100%;border-radius:10px}
    .sub{color:var(--muted);font-size:12px}
    details.section{background:var(--card);border-radius:16px;margin-top:16px;box-shadow:inset 0 0 0 1px var(--line)}
    details.section > summary{cursor:pointer;padding:16px 20px;font-weight:700;display:flex;justify-content:space-between;gap:12px}
    .section-body{padding:0 20px 16px}
    .item{border:1px solid var(--line);border-left-width:4px;border-radius:12px;padding:12px;margin-top:10px}
    .item-pass{border-left-color:var(--pass)}.item-fail{border-left-color:var(--fail)}
    .item-warning{border-left-color:var(--warning)}.item-info{border-left-color:var(--info)}
    .item-access-denied{border-left-color:var(--denied)}
    .item-head{display:flex;gap:12px;align-items:center;font-weight:600}
    .badge{font-size:11px;font-weight:700;padding:2px 8px;border-radius:999px;color:#fff;white-space:nowrap}
    .badge-pass{background:var(--pass)}.badge-fail{background:var(--fail)}.badge-warning{background:var(--warning)}
    .badge-info{background:var(--info)}.badge-access-denied{background:var(--denied)}
    .item-body{margin-top:8px;font-size:14px}
    .item-body pre{background:#f1f5f9;border-radius:8px;padding:8px;white-space:pre-wrap}
    .recommendation{margin-top:10px;padding:10px;border-radius:8px;background:#fff7ed;font-size:14px}
    footer{margin-top:32px;text-align:center}
`;

// Search, failed-only filter and expand/collapse. Runs in the browser.
export const SCRIPT = `
  (function(){
    "use strict";
    const $  = (s, r) => (r||document).querySelector(s);
    const $$ = (s, r) => Array.from((r||document).querySelectorAll(s));
    const norm = s => String(s||"").toLowerCase();

    function applyFilters(){
      const query = norm($("#search") ? $("#search").value : "").trim();
      const failedOnly = !!($("#onlyFailed") && $("#onlyFailed").checked);
      $$("details.section").forEach(section => {
        let shown = 0;
        $$(".item", section).forEach(el => {
          const ds = el.dataset || {};
          const show = (!query || (ds.search || "").includes(query)) &&
                       (!failedOnly || ds.status === "fail");
          el.style.display = show ? "" : "none";
          if (show) shown++;
        });
        section.style.display = shown || (!query && !failedOnly) ? "" : "none";
        if (shown && (query || failedOnly)) section.open = true;
      });
    }

    let t = null;
    $("#search")?.addEventListener("input", () => {
      if (t) clearTimeout(t);
      t = setTimeout(applyFilters, 120);
    });
    $("#onlyFailed")?.addEventListener("change", applyFilters);
    $("#btnExpandAll")?.addEventListener("click", () => {
      $$("details.section").forEach(d => { if (d.style.display !== "none") d.open = true; });
    });
    $("#btnCollapseAll")?.addEventListener("click", () => {
      $$("details.section").forEach(d => { d.open = false; });
    });
  })();
`;

export function renderRich(rich: RichText): string {
  if (typeof rich === 'string') return `<p>${esc(rich)}</p>`;
  return rich
    .map((block): string => {
      switch (block.kind) {
        case 'text':
          return `<p>${esc(block.text)}</p>`;
        case 'list':
          return `<ul>${block.items.map((i) => `<li>${esc(i)}</li>`).join('')}</ul>`;
        case 'code':
          return `<pre><code>${esc(block.text)}</code></pre>`;
      }
    })
    .join('');
}

export function renderItem(item: CheckItem): string {
  const searchable = [item.title, ...richToLines(item.details), item.recommendation ?? '']
    .join(' ')
    .toLowerCase();
  const recommendation = item.recommendation
    ? `<div class="recommendation"><b>Recommendation:</b> ${esc(item.recommendation)}</div>`
    : '';
  return (
    `<div class="item item-${item.outcome}" data-status="${item.outcome}" data-search="${esc(searchable)}">` +
    `<div class="item-head"><span class="badge badge-${item.outcome}">` +
    `${OUTCOME_GLYPH[item.outcome]} ${OUTCOME_LABEL[item.outcome]}</span>` +
    `<span>${esc(item.title)}</span></div>` +
    `<div class="item-body">${renderRich(item.details)}</div>` +
    recommendation +
    `</div>`
  );
}

function sectionSummary(counters: Counters): string {
  if (counters.total === 0) return '';
  const parts = [`${counters.passed} passed`, `${counters.failed} failed`, `${counters.warning} warnings`];
  return `<span class="sub">${parts.join(' · ')} · ${percentage(counters)}%</span>`;
}

/** Only the first section starts open; the requested state travels as a data attribute. */
export function renderSection(section: Section, index: number): string {
  const open = index === 0 ? ' open' : '';
  return (
    `<details class="section" id="section-${esc(section.id)}" ` +
    `data-display-state="${section.displayState}"${open}>` +
    `<summary><span>${esc(section.title)}</span>${sectionSummary(section.counters)}</summary>` +
    `<div class="section-body">${section.items.map(renderItem).join('\n')}</div>` +
    `</details>`
  );
}

export function renderSummaryWidget(counters: Counters, pct: number): string {
  const color = BAND_COLORS[band(pct)];
  const stat = (key: string, label: string, value: number) =>
    `<div class="stat stat-${key}"><b>${value}</b>${label}</div>`;
  return `<section class="card summary">
      <h2>Assessment Summary</h2>
      <div class="stats">
        ${stat('total', 'Total Checks', counters.total)}
        ${stat('passed', 'Passed', counters.passed)}
        ${stat('failed', 'Failed', counters.failed)}
        ${stat('warning', 'Warnings', counters.warning)}
      </div>
      <div class="score">${pct}%</div>
      <div class="bar"><div class="bar-fill" style="width:${pct}%;background:${color}"></div></div>
      <p class="sub">Compliance excludes ${counters.warning} warning and ${counters.accessDenied} access-denied checks.</p>
    </section>`;
}

export function renderHtml(report: FinalizedReport): string {
  const { metadata } = report;
  const rows: Array<[string, string]> = [
    ['Account', metadata.accountId],
    ['Scope', metadata.scope],
    ['Assessment Date', metadata.timestamp],
    ['Assessed By', metadata.actor],
  ];

  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8"/>
  <meta name="viewport" content="width=device-width, initial-scale=1"/>
  <title>${esc(metadata.title)}</title>
  <style>${STYLES}</style>
</head>
<body>
  <div class="page">
    <div class="menu">
      <input id="search" type="search" placeholder="Search findings..."/>
      <label class="checkline"><input id="onlyFailed" type="checkbox"/> Only failed</label>
      <button id="btnExpandAll">Expand All</button>
      <button id="btnCollapseAll">Collapse All</button>
    </div>
    <h1>${esc(metadata.title)}</h1>
    <section class="card">
      <table class="info-table">
        ${rows.map(([k, v]) => `<tr><th>${k}</th><td>${esc(v)}</td></tr>`).join('\n        ')}
      </table>
    </section>
    ${renderSummaryWidget(report.counters, report.percentage)}
    ${report.sections.map(renderSection).join('\n    ')}
    <footer class="sub">Report finalized ${esc(report.finalizedAt)}</footer>
  </div>
  <script>${SCRIPT}</script>
</body>
</html>
`;
}

export async function writeHtml(report: FinalizedReport, outDir: string, baseName: string) {
  await fs.mkdir(outDir, { recursive: true });
  const file = path.join(outDir, `${baseName}.html`);
  await fs.writeFile(file, renderHtml(report), 'utf8');
  return file;
}
