/**
 * Adapter Factory
 *
 * Builds the pipeline components from datasources.yml. All components of one
 * factory share a single request budget.
 */

import { Logger, PageFetcher } from './DataSourceAdapter';
import { FixturePageFetcher } from './FixturePageFetcher';
import { LeagueResolver } from './LeagueResolver';
import { MatchLocator } from './MatchLocator';
import { MatchParamsExtractor } from './MatchParamsExtractor';
import { OddsFetcher } from './OddsFetcher';
import { createTokenExtractors } from './token-extractors';
import { PipelineConfig, loadConfig } from '../lib/config';
import { HttpClient } from '../lib/http-client';
import { AesPayloadDecoder, JsonPayloadDecoder, PayloadDecoder } from '../lib/payload-decoder';
import { RateLimiter } from '../lib/rate-limiter';
import { PipelineOrchestrator } from '../src/pipeline/orchestrator';
import { DrizzleSink } from '../src/storage/drizzle-sink';
import { MemorySink } from '../src/storage/memory-sink';
import { OddsSink } from '../src/storage/sink';

export interface FactoryOptions {
  /** Serve pages from this directory instead of the network */
  fixturesDir?: string;
  /** Keep records in memory instead of writing to Postgres */
  dryRun?: boolean;
  logger?: Logger;
}

export class AdapterFactory {
  readonly config: PipelineConfig;
  private options: FactoryOptions;
  private logger: Logger;
  private budget: RateLimiter;
  private pageFetcher: PageFetcher | null = null;
  private decoder: PayloadDecoder | null = null;

  constructor(config: PipelineConfig | string = 'datasources.yml', options: FactoryOptions = {}) {
    this.config = typeof config === 'string' ? loadConfig(config) : config;
    this.options = options;
    this.logger = options.logger ?? console;
    this.budget = new RateLimiter(this.config.budget);
  }

  createFetcher(): PageFetcher {
    if (this.pageFetcher) return this.pageFetcher;

    if (this.options.fixturesDir) {
      const fixtures = new FixturePageFetcher({ dataPath: this.options.fixturesDir, logger: this.logger });
      if (!fixtures.isAvailable()) {
        throw new Error(`Fixtures directory not found: ${this.options.fixturesDir}`);
      }
      this.pageFetcher = fixtures;
    } else {
      this.pageFetcher = new HttpClient({
        budget: this.budget,
        userAgent: this.config.source.userAgent,
        timeoutMs: this.config.source.timeoutMs,
        retry: this.config.retry,
        logger: this.logger,
      });
    }
    return this.pageFetcher;
  }

  createDecoder(): PayloadDecoder {
    if (this.decoder) return this.decoder;

    const { source } = this.config;
    this.decoder =
      source.payloadDecoder === 'aes'
        ? new AesPayloadDecoder({ password: source.payloadPassword ?? '', salt: source.payloadSalt ?? '' })
        : new JsonPayloadDecoder();
    return this.decoder;
  }

  createResolver(): LeagueResolver {
    return new LeagueResolver(this.createFetcher(), this.logger);
  }

  createLocator(): MatchLocator {
    return new MatchLocator({
      fetcher: this.createFetcher(),
      decoder: this.createDecoder(),
      baseUrl: this.config.source.baseUrl,
      resultsTimezone: this.config.source.resultsTimezone,
      logger: this.logger,
    });
  }

  createExtractor(): MatchParamsExtractor {
    return new MatchParamsExtractor({
      fetcher: this.createFetcher(),
      tokenExtractors: createTokenExtractors(this.config.tokenExtraction),
      logger: this.logger,
    });
  }

  createOddsFetcher(): OddsFetcher {
    return new OddsFetcher({
      fetcher: this.createFetcher(),
      decoder: this.createDecoder(),
      baseUrl: this.config.source.baseUrl,
      maxConcurrentMarkets: this.config.pipeline.maxConcurrentMarkets,
      logger: this.logger,
    });
  }

  createSink(): OddsSink {
    if (this.options.dryRun) {
      this.logger.log('[SINK] Dry run: records stay in memory');
      return new MemorySink();
    }
    if (!this.config.databaseUrl) {
      this.logger.warn('[SINK] ⚠️  DATABASE_URL is not set, records stay in memory');
      return new MemorySink();
    }
    return new DrizzleSink({ connectionString: this.config.databaseUrl, logger: this.logger });
  }

  createPipeline(sink: OddsSink = this.createSink()): PipelineOrchestrator {
    const { pipeline } = this.config;
    return new PipelineOrchestrator(
      {
        resolver: this.createResolver(),
        locator: this.createLocator(),
        extractor: this.createExtractor(),
        fetcher: this.createOddsFetcher(),
        sink,
        logger: this.logger,
      },
      {
        bettingTypeIds: pipeline.defaultBettingTypes,
        scopeIds: pipeline.defaultScopes,
        maxConcurrentMatches: pipeline.maxConcurrentMatches,
        maxConcurrentMarkets: pipeline.maxConcurrentMarkets,
        clockSkewToleranceSeconds: pipeline.clockSkewToleranceSeconds,
      },
    );
  }
}
