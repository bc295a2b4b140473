/**
 * Fixture Page Fetcher
 *
 * Serves pages and endpoint bodies from files in a local directory instead
 * of the network. Used for dry runs and for replaying a captured crawl.
 *
 * A URL maps to a file named after its path: every character outside
 * [A-Za-z0-9._-] becomes "_", with an optional .html or .json extension.
 *
 *   https://host/football/england/premier-league/results/
 *     -> football_england_premier-league_results(.html|.json)
 */

import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { FetchTextOptions, Logger, PageFetcher } from './DataSourceAdapter';
import { HttpStatusError } from '../lib/errors';

const EXTENSIONS = ['', '.html', '.json'];

export function fixtureFileName(url: string): string {
  const { pathname } = new URL(url);
  const trimmed = pathname.replace(/^\/+|\/+$/g, '');
  return trimmed === '' ? 'index' : trimmed.replace(/[^A-Za-z0-9._-]/g, '_');
}

export class FixturePageFetcher implements PageFetcher {
  private dataPath: string;
  private logger: Logger;

  constructor(config: { dataPath: string; logger?: Logger }) {
    this.dataPath = config.dataPath;
    this.logger = config.logger ?? console;
  }

  isAvailable(): boolean {
    return existsSync(this.dataPath);
  }

  async fetchText(url: string, options: FetchTextOptions = {}): Promise<string> {
    options.signal?.throwIfAborted();

    const base = path.join(this.dataPath, fixtureFileName(url));
    for (const ext of EXTENSIONS) {
      const filePath = base + ext;
      if (existsSync(filePath)) {
        return readFileSync(filePath, 'utf8');
      }
    }

    this.logger.warn(`[FIXTURE] ⚠️  No fixture for ${url} (looked for ${base})`);
    throw new HttpStatusError(404, url, '');
  }
}
