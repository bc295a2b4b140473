/**
 * Access token recovery strategies for match pages.
 *
 * Each strategy looks for its own kind of evidence on the page. `null` means
 * "nothing here for me", so the next strategy gets a turn; a string (even an
 * empty one) means the page did carry a token slot and that is the answer.
 */

import { StructuralChangeError } from '../lib/errors';

export interface MatchPageEvidence {
  /** `eventData` object from the event header, when the page had one */
  header: Record<string, unknown> | null;
  /** Concatenated inline script text */
  scripts: string;
}

export interface TokenExtractor {
  readonly name: string;
  extract(page: MatchPageEvidence): string | null;
}

/** Token served in clear on the event header (`xhashf`, falling back to `xhash`) */
export class HeaderTokenExtractor implements TokenExtractor {
  readonly name = 'header';

  extract(page: MatchPageEvidence): string | null {
    if (!page.header) return null;
    const candidates = [page.header.xhashf, page.header.xhash].filter(
      (v): v is string => typeof v === 'string',
    );
    if (candidates.length === 0) return null;
    return candidates.find((v) => v !== '') ?? '';
  }
}

export interface SubstitutionPatterns {
  /** Regex whose first group is the encoded token */
  valuePattern: string;
  /** Regex whose first group is a JSON object mapping character -> character */
  tablePattern: string;
}

/**
 * Token served encoded next to a per-page character table. Every character
 * of the encoded value is replaced through the table; characters the table
 * does not mention pass through unchanged.
 */
export class SubstitutionTokenExtractor implements TokenExtractor {
  readonly name = 'substitution';
  private valuePattern: RegExp;
  private tablePattern: RegExp;

  constructor(patterns: SubstitutionPatterns) {
    this.valuePattern = new RegExp(patterns.valuePattern);
    this.tablePattern = new RegExp(patterns.tablePattern);
  }

  extract(page: MatchPageEvidence): string | null {
    const value = this.valuePattern.exec(page.scripts)?.[1];
    const tableText = this.tablePattern.exec(page.scripts)?.[1];
    if (value === undefined || tableText === undefined) return null;

    return substitute(value, parseTable(tableText));
  }
}

export function substitute(encoded: string, table: Record<string, string>): string {
  return Array.from(encoded)
    .map((ch) => table[ch] ?? ch)
    .join('');
}

function parseTable(text: string): Record<string, string> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new StructuralChangeError('Token substitution table is not JSON');
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new StructuralChangeError('Token substitution table is not an object');
  }

  const table: Record<string, string> = {};
  for (const [from, to] of Object.entries(parsed)) {
    if (typeof to !== 'string') {
      throw new StructuralChangeError(`Token substitution table maps "${from}" to a non-string`);
    }
    table[from] = to;
  }
  return table;
}

export interface TokenExtractionConfig {
  strategies: Array<'header' | 'substitution'>;
  substitution: SubstitutionPatterns;
}

export function createTokenExtractors(config: TokenExtractionConfig): TokenExtractor[] {
  return config.strategies.map((strategy) => {
    switch (strategy) {
      case 'header':
        return new HeaderTokenExtractor();
      case 'substitution':
        return new SubstitutionTokenExtractor(config.substitution);
    }
  });
}

/** First strategy that finds evidence wins */
export function extractToken(
  extractors: TokenExtractor[],
  page: MatchPageEvidence,
): { token: string; strategy: string } | null {
  for (const extractor of extractors) {
    const token = extractor.extract(page);
    if (token !== null) return { token, strategy: extractor.name };
  }
  return null;
}
