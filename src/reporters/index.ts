import type { FinalizedReport } from '../types.js';
import { writeHtml } from './html.js';
import { writeJson } from './json.js';
import { writeText } from './text.js';

export type ReportFiles = { html: string; text: string; json: string };

export async function writeReportFiles(
  report: FinalizedReport,
  outDir: string,
  baseName: string,
): Promise<ReportFiles> {
  const html = await writeHtml(report, outDir, baseName);
  const text = await writeText(report, outDir, baseName);
  const json = await writeJson(report, outDir, baseName);
  return { html, text, json };
}

export { renderHtml } from './html.js';
export { renderText } from './text.js';
export { renderJson } from './json.js';
export { reportBaseName } from './shared.js';
