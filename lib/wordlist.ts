import { readFile } from 'fs/promises';
import { moduleLogger } from './logger';
import type { AppConfig } from './config';

const logger = moduleLogger('wordlist');

/** Trimmed, lowercased, non-empty lines of `text`, at most `limit` when limit > 0. */
export function parseWordlist(text: string, limit = 0): string[] {
  const words: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const token = line.trim().toLowerCase();
    if (!token) continue;
    words.push(token);
    if (limit > 0 && words.length >= limit) break;
  }
  return words;
}

/** Read a wordlist file; unreadable files contribute nothing. */
export async function readWordlist(path: string, limit = 0): Promise<string[]> {
  try {
    return parseWordlist(await readFile(path, 'utf8'), limit);
  } catch (err) {
    logger.debug({ err, path }, 'wordlist not readable, skipping');
    return [];
  }
}

/**
 * Extra bruteforce terms from the configured files: the optional extra list in
 * full, then the large list capped at its minimum-word count in file order.
 */
export async function loadExtraWords(bruteforce: AppConfig['BRUTEFORCE']): Promise<string[]> {
  const words: string[] = [];
  if (bruteforce.EXTRA_WORDLIST) {
    words.push(...(await readWordlist(bruteforce.EXTRA_WORDLIST)));
  }
  if (bruteforce.SECLISTS_WORDLIST) {
    words.push(...(await readWordlist(bruteforce.SECLISTS_WORDLIST, bruteforce.SECLISTS_MIN_WORDS)));
  }
  return words;
}
