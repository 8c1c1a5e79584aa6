import { ConfigError, NormalizationError, ValidationError } from '@docket/core';
import { describe, expect, it } from 'vitest';
import { catchError } from '../../core/tests/helpers.js';
import { createSpiderContract, SPIDER_CARD, spiderContract } from '../src/index.js';

describe('spiderContract.validateSetup', () => {
  it('accepts an API key', () => {
    expect(spiderContract.validateSetup({ spider_api_key: 'test-secret' })).toEqual({
      spider_api_key: 'test-secret',
    });
  });

  it('requires an API key', () => {
    const error = catchError(() => spiderContract.validateSetup({}), ConfigError);

    expect(error.code).toBe('MISSING_CREDENTIAL');
    expect(error.field).toBe('spider_api_key');
    expect(error.message).toBe('spider setup is missing required credential "spider_api_key"');
  });
});

describe('spiderContract.validateArguments', () => {
  it('defaults mode to scrape', () => {
    expect(spiderContract.validateArguments({ url: 'https://example.com' })).toEqual({
      url: 'https://example.com',
      mode: 'scrape',
    });
  });

  it('passes params through untouched', () => {
    const params = { limit: 5, return_format: 'markdown', nested: { depth: 2 } };

    expect(spiderContract.validateArguments({ url: 'https://example.com', params })).toEqual({
      url: 'https://example.com',
      mode: 'scrape',
      params,
    });
  });

  it('copies params', () => {
    const params = { limit: 5, nested: { depth: 2 } };
    const resolved = spiderContract.validateArguments({ url: 'https://example.com', params });
    params.limit = 50;
    params.nested.depth = 9;

    expect(resolved.params).not.toBe(params);
    expect(resolved.params).toEqual({ limit: 5, nested: { depth: 2 } });
  });

  it('rejects unknown modes', () => {
    const error = catchError(
      () => spiderContract.validateArguments({ url: 'https://example.com', mode: 'crawl' }),
      ValidationError
    );

    expect(error.code).toBe('INVALID_ENUM');
    expect(error.field).toBe('mode');
    expect(error.message).toBe('mode must be one of: "scrape"');
  });

  it('requires a url', () => {
    const error = catchError(() => spiderContract.validateArguments({}), ValidationError);

    expect(error.code).toBe('MISSING_FIELD');
    expect(error.field).toBe('url');
    expect(error.message).toBe('url is required');
  });

  it('rejects an empty url', () => {
    const error = catchError(() => spiderContract.validateArguments({ url: '' }), ValidationError);

    expect(error.code).toBe('MISSING_FIELD');
    expect(error.message).toBe('url must not be empty');
  });

  it('rejects a url that does not parse', () => {
    const error = catchError(() => spiderContract.validateArguments({ url: 'not a url' }), ValidationError);

    expect(error.code).toBe('INVALID_FORMAT');
    expect(error.field).toBe('url');
    expect(error.message).toBe('url is not a valid crawl target: Invalid URL: not a url');
  });

  it('rejects internal hosts by default', () => {
    const error = catchError(
      () => spiderContract.validateArguments({ url: 'http://127.0.0.1/admin' }),
      ValidationError
    );

    expect(error.message).toBe('url is not a valid crawl target: Blocked internal IP address: 127.0.0.1');
  });

  it.each([
    'http://0.0.0.0:8080/',
    'http://localhost./',
    'http://app.localhost:3000/',
  ])('rejects loopback host %s', (url) => {
    const error = catchError(() => spiderContract.validateArguments({ url }), ValidationError);

    expect(error.code).toBe('INVALID_FORMAT');
    expect(error.field).toBe('url');
  });

  it('accepts internal hosts when allowed', () => {
    const spider = createSpiderContract({ allowInternalUrls: true });

    expect(spider.validateArguments({ url: 'http://localhost:8080/' })).toEqual({
      url: 'http://localhost:8080/',
      mode: 'scrape',
    });
  });

  it('rejects unknown fields', () => {
    const error = catchError(
      () => spiderContract.validateArguments({ url: 'https://example.com', depth: 2 }),
      ValidationError
    );

    expect(error.code).toBe('UNKNOWN_FIELD');
    expect(error.field).toBe('depth');
  });

  it('requires params to be an object', () => {
    const error = catchError(
      () => spiderContract.validateArguments({ url: 'https://example.com', params: 'limit=5' }),
      ValidationError
    );

    expect(error.code).toBe('INVALID_TYPE');
    expect(error.message).toBe('params must be object');
  });
});

describe('spiderContract.describe', () => {
  it('returns the Spider card', () => {
    const card = spiderContract.describe();

    expect(card).toBe(SPIDER_CARD);
    expect(card.provider).toBe('spider');
    expect(card.methods).toEqual([{ method: 'crawl', description: 'Crawl a website and extract data' }]);
    expect(card.setup.fields).toEqual(['spider_api_key']);
    expect(card.info.friendlyName).toBe('Spider');
    expect(card.apiConfig.envVar).toBe('SPIDER_API_KEY');
    expect(card.inputFormats).toBeUndefined();
  });
});

describe('spiderContract.normalize', () => {
  it('maps page_content to content', () => {
    const output = spiderContract.normalize([
      { page_content: 'Hello', url: 'https://example.com', status: 200 },
      { page_content: 'About', url: 'https://example.com/about', status: 200 },
    ]);

    expect(output).toEqual({
      documents: [
        { content: 'Hello', metadata: { url: 'https://example.com', status: 200 } },
        { content: 'About', metadata: { url: 'https://example.com/about', status: 200 } },
      ],
    });
  });

  it('normalizes an empty crawl after validating its arguments', () => {
    spiderContract.validateArguments({ url: 'https://example.com', mode: 'scrape' });
    expect(spiderContract.normalize([])).toEqual({ documents: [] });
  });

  it('rejects items without page_content', () => {
    const error = catchError(
      () => spiderContract.normalize([{ content: 'Hello' }]),
      NormalizationError
    );

    expect(error.code).toBe('MISSING_CONTENT');
    expect(error.message).toBe('spider response item 0 has no "page_content" text');
  });
});
