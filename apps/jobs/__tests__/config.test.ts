// Unit tests for configuration loading

import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { parseConfig } from '../lib/config';

const CONFIG_PATH = path.resolve(__dirname, '../../../datasources.yml');

function document(): unknown {
  return yaml.load(fs.readFileSync(CONFIG_PATH, 'utf8'));
}

describe('Pipeline config', () => {
  test('checked-in datasources.yml is valid', () => {
    const config = parseConfig(document(), {});

    expect(config.source.baseUrl).toBe('https://www.oddsportal.com');
    expect(config.source.payloadDecoder).toBe('json');
    expect(config.retry.maxAttempts).toBe(4);
    expect(config.budget.maxConcurrency).toBe(2);
    expect(config.pipeline.defaultBettingTypes).toEqual([1]);
    expect(config.pipeline.defaultScopes).toEqual([2]);
    expect(config.tokenExtraction.strategies).toEqual(['header', 'substitution']);
    expect(config.databaseUrl).toBeUndefined();
  });

  test('environment overrides', () => {
    const config = parseConfig(document(), {
      ODDS_BASE_URL: 'https://odds.example.test/',
      ODDS_MAX_CONCURRENCY: '3',
      ODDS_PAYLOAD_PASSWORD: 'test-secret',
      ODDS_PAYLOAD_SALT: 'test-salt',
      DATABASE_URL: 'postgres://localhost/odds_test',
    });

    expect(config.source.baseUrl).toBe('https://odds.example.test');
    expect(config.budget.maxConcurrency).toBe(3);
    expect(config.source.payloadPassword).toBe('test-secret');
    expect(config.source.payloadSalt).toBe('test-salt');
    expect(config.databaseUrl).toBe('postgres://localhost/odds_test');
  });

  test('invalid values are reported by path', () => {
    const raw = document();
    const broken = typeof raw === 'object' && raw !== null ? { ...raw, retry: { maxAttempts: 0 } } : {};
    expect(() => parseConfig(broken, {})).toThrow(/retry\.maxAttempts/);
  });

  test('an empty document is rejected', () => {
    expect(() => parseConfig(null, {})).toThrow(/Invalid configuration/);
  });
});
