/**
 * Spider Provider Types
 *
 * Shapes for the Spider web-crawling API integration
 * @see https://spider.cloud/docs/api
 */

export const SPIDER_PROVIDER = 'spider';

/** Crawl modes accepted by the integration */
export const SPIDER_MODES = ['scrape'] as const;

export type SpiderMode = typeof SPIDER_MODES[number];

/**
 * Credentials for the Spider API
 */
export type SpiderSetup = {
  /** API key for Spider */
  spider_api_key: string;
};

/**
 * Arguments as a caller writes them
 */
export type SpiderFetchArguments = {
  /** The URL to fetch data from */
  url: string;
  /** The type of crawler to use (default: 'scrape') */
  mode?: SpiderMode;
  /** Additional parameters passed through to the Spider API */
  params?: Record<string, unknown>;
};

/**
 * Arguments after defaults have been applied and validated
 */
export type ResolvedSpiderFetchArguments = {
  url: string;
  mode: SpiderMode;
  params?: Record<string, unknown>;
};
