import { resolve, relative, extname } from 'node:path';

export function normalizeFilePath(filePath: string, repoRoot: string): string {
  const abs = resolve(repoRoot, filePath);
  return relative(repoRoot, abs).split('\\').join('/');
}

export function getExtension(filePath: string): string {
  return extname(filePath).toLowerCase();
}

/** Last path segment, for either separator. */
export function fileNameOf(filePath: string): string {
  const normalized = filePath.replace(/\\/g, '/');
  const lastSlash = normalized.lastIndexOf('/');
  return lastSlash >= 0 ? normalized.slice(lastSlash + 1) : normalized;
}
