import fs from 'fs';
import { ConfigurationError } from '../errors.js';

/**
 * Reads one target per line. Blank lines and lines beginning with `#` are
 * skipped; the `#` must be the first character of the line.
 */
export function readTargetsFile(filePath: string): string[] {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    throw new ConfigurationError(
      'UnreadableTargetsFile',
      `Can't read targets from input file '${filePath}'.`,
      { cause: err },
    );
  }

  return content
    .split(/\r?\n/)
    .filter(line => line.trim() && !line.startsWith('#'))
    .map(line => line.trim());
}
