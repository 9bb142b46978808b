/**
 * Tests for configuration loading
 */

import { describe, it, expect } from 'vitest';
import { loadConfig, describeConfig, DEFAULT_DENY_LIST } from '../src/config';
import { ConfigError } from '../src/lib/errors';

function captureConfigError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error('Expected a ConfigError');
}

const blueskyCreds = {
  BLUESKY_HANDLE: 'popcast.test',
  BLUESKY_APP_PASSWORD: 'test-secret',
};

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig(blueskyCreds);

    expect(config.checkIntervalMinutes).toBe(180);
    expect(config.region).toBe('pl');
    expect(config.scrapePages).toEqual(['sale', 'new-releases', 'exclusives']);
    expect(config.maxPostsPerCheck).toBe(0);
    expect(config.postDelaySeconds).toBe(0);
    expect(config.fandoms).toBe('All');
    expect(config.denyList).toEqual([...DEFAULT_DENY_LIST]);
    expect(config.dryRun).toBe(false);
    expect(config.imageFailurePolicy).toBe('skip');
    expect(config.fetchConcurrency).toBe(3);
    expect(config.requestTimeoutMs).toBe(30000);
    expect(config.ledger).toEqual({ backend: 'file', path: 'data/announced.jsonl' });
    expect(config.publisher).toEqual({
      kind: 'bluesky',
      service: 'https://bsky.social',
      handle: 'popcast.test',
      appPassword: 'test-secret',
    });
  });

  it('parses lists and numbers from the environment', () => {
    const config = loadConfig({
      ...blueskyCreds,
      CHECK_INTERVAL_MINUTES: '30',
      CATALOG_REGION: ' DE ',
      SCRAPE_PAGES: 'sale, coming-soon',
      MAX_POSTS_PER_CHECK: '2',
      FANDOMS: 'Marvel, Star Wars',
      DENY_LIST: 'NBA, NFL',
      IMAGE_FAILURE_POLICY: 'text_only',
    });

    expect(config.checkIntervalMinutes).toBe(30);
    expect(config.region).toBe('de');
    expect(config.scrapePages).toEqual(['sale', 'coming-soon']);
    expect(config.maxPostsPerCheck).toBe(2);
    expect(config.fandoms).toEqual(['Marvel', 'Star Wars']);
    expect(config.denyList).toEqual(['nba', 'nfl']);
    expect(config.imageFailurePolicy).toBe('text_only');
  });

  it('treats "all" in the allow-list as no restriction', () => {
    expect(loadConfig({ ...blueskyCreds, FANDOMS: 'Marvel,all' }).fandoms).toBe('All');
  });

  it('keeps an empty region for the US store', () => {
    expect(loadConfig({ ...blueskyCreds, CATALOG_REGION: '' }).region).toBe('');
  });

  it('reads DRY_RUN and lets the override win', () => {
    expect(loadConfig({ DRY_RUN: 'true' }).dryRun).toBe(true);
    expect(loadConfig({ ...blueskyCreds, DRY_RUN: 'true' }, { dryRun: false }).dryRun).toBe(false);
  });

  it('requires publisher credentials unless dry-run', () => {
    const error = captureConfigError(() => loadConfig({}));

    expect(error.issues).toEqual([
      'BLUESKY_HANDLE: required unless running with --dry-run',
      'BLUESKY_APP_PASSWORD: required unless running with --dry-run',
    ]);
    expect(() => loadConfig({}, { dryRun: true })).not.toThrow();
  });

  it('requires a webhook for the slack publisher', () => {
    const error = captureConfigError(() => loadConfig({ PUBLISHER: 'slack' }));
    expect(error.issues).toEqual(['SLACK_WEBHOOK_URL: required unless running with --dry-run']);

    const config = loadConfig({ PUBLISHER: 'slack', SLACK_WEBHOOK_URL: 'https://hooks.example.test/T000' });
    expect(config.publisher).toEqual({ kind: 'slack', webhookUrl: 'https://hooks.example.test/T000' });
  });

  it('treats empty strings as unset', () => {
    const error = captureConfigError(() =>
      loadConfig({ BLUESKY_HANDLE: '', BLUESKY_APP_PASSWORD: 'test-secret' })
    );
    expect(error.issues).toEqual(['BLUESKY_HANDLE: required unless running with --dry-run']);
  });

  it('requires supabase settings for the supabase ledger', () => {
    const error = captureConfigError(() =>
      loadConfig({ ...blueskyCreds, LEDGER_BACKEND: 'supabase' })
    );

    expect(error.issues).toEqual([
      'SUPABASE_URL: required for the supabase ledger',
      'SUPABASE_SERVICE_ROLE_KEY: required for the supabase ledger',
    ]);
  });

  it('builds the supabase ledger config', () => {
    const config = loadConfig({
      ...blueskyCreds,
      LEDGER_BACKEND: 'supabase',
      SUPABASE_URL: 'https://ledger.example.test',
      SUPABASE_SERVICE_ROLE_KEY: 'test-secret',
    });

    expect(config.ledger).toEqual({
      backend: 'supabase',
      url: 'https://ledger.example.test',
      serviceRoleKey: 'test-secret',
      table: 'announced_items',
    });
  });

  it('reports every invalid key', () => {
    const error = captureConfigError(() =>
      loadConfig({
        ...blueskyCreds,
        CHECK_INTERVAL_MINUTES: '0',
        SCRAPE_PAGES: ' , ',
        IMAGE_FAILURE_POLICY: 'retry',
      })
    );

    expect(error.issues.map(issue => issue.split(':')[0])).toEqual([
      'CHECK_INTERVAL_MINUTES',
      'SCRAPE_PAGES',
      'IMAGE_FAILURE_POLICY',
    ]);
    expect(error.issues[1]).toBe('SCRAPE_PAGES: at least one page is required');
    expect(error.message.startsWith('Invalid configuration: ')).toBe(true);
  });
});

describe('describeConfig', () => {
  it('leaves secrets out', () => {
    const described = describeConfig(loadConfig(blueskyCreds));

    expect(described.publisher).toBe('bluesky');
    expect(described.ledger).toBe('file');
    expect(JSON.stringify(described)).not.toContain('test-secret');
  });
});
