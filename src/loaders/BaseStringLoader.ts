import { readIfExists } from './ConfigLoader';

/**
 * Load base strings, one per line.
 * Lines are trimmed and blank ones dropped; a missing file yields an empty list.
 */
export function loadBaseStrings(inputPath: string): string[] {
  const contents = readIfExists(inputPath);
  if (contents === null) {
    return [];
  }

  return contents
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);
}
