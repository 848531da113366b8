import * as cheerio from 'cheerio';

const probe = cheerio.load('');

/**
 * Keep the CSS selectors cheerio can parse. Blank and malformed entries are reported through
 * `onInvalid` and left out, so later lookups never throw.
 */
export function filterValidSelectors(
  selectors: readonly string[],
  onInvalid?: (selector: string, reason: string) => void
): string[] {
  const valid: string[] = [];

  for (const selector of selectors) {
    if (!selector.trim()) {
      onInvalid?.(selector, 'empty selector');
      continue;
    }
    try {
      probe(selector);
      valid.push(selector);
    } catch (error) {
      onInvalid?.(selector, error instanceof Error ? error.message : 'Unknown error');
    }
  }

  return valid;
}

/**
 * Compile regular expressions once. Malformed patterns never match, so they are dropped here.
 */
export function compilePatterns(
  patterns: readonly string[],
  onInvalid?: (pattern: string, reason: string) => void
): RegExp[] {
  const compiled: RegExp[] = [];

  for (const pattern of patterns) {
    try {
      compiled.push(new RegExp(pattern));
    } catch (error) {
      onInvalid?.(pattern, error instanceof Error ? error.message : 'Unknown error');
    }
  }

  return compiled;
}
