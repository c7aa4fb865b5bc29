import { promises as fs } from 'node:fs';

// `#` is atext, so only a `#` standing alone or followed by whitespace opens a comment.
const COMMENT_LINE = /^#(\s|$)/;

/**
 * Reads a list of addresses, one per line. Surrounding whitespace is trimmed;
 * blank lines and comment lines are skipped.
 */
export async function readAddressList(filePath: string): Promise<string[]> {
  const content = await fs.readFile(filePath, 'utf8');
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !COMMENT_LINE.test(line));
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
