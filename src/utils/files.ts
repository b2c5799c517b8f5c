import fg from 'fast-glob';
import path from 'path';

/** Absolute paths of the files under `cwd` matching `patterns`, sorted. */
export async function findFiles(cwd: string, patterns: string[]): Promise<string[]> {
  const files = await fg(patterns, {
    cwd,
    absolute: true,
    onlyFiles: true,
    followSymbolicLinks: true,
    ignore: ['**/node_modules/**'],
  });
  return files.sort();
}

export function rel(cwd: string, abs: string) {
  const relative = path.relative(cwd, abs);
  // Normalize to POSIX-style separators for consistent reporting
  return relative.split(path.sep).join('/');
}
