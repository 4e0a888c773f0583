import { MarcFormat } from './types';

/**
 * Decide which surface syntax a document uses from its first non-blank line.
 * Documents with no content are treated as MRK.
 */
export function detectFormat(content: string): MarcFormat {
  for (const line of content.split('\n')) {
    const stripped = line.trim();
    if (!stripped) {
      continue;
    }
    return stripped.startsWith('=') ? 'mrk' : 'line';
  }
  return 'mrk';
}
