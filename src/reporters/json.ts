import { promises as fs } from 'fs';
import path from 'path';
import type { FinalizedReport } from '../types.js';

export function renderJson(report: FinalizedReport): string {
  return JSON.stringify(report, null, 2);
}

export async function writeJson(report: FinalizedReport, outDir: string, baseName: string) {
  await fs.mkdir(outDir, { recursive: true });
  const file = path.join(outDir, `${baseName}.json`);
  await fs.writeFile(file, renderJson(report), 'utf8');
  return file;
}
