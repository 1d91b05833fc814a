import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { getConfig, isTest, resetConfig } from '../../src/utils/config';
import { ConfigurationError } from '../../src/utils/errors';

describe('getConfig', () => {
  const saved = { ...process.env };

  beforeEach(() => {
    resetConfig();
  });

  afterEach(() => {
    process.env = { ...saved };
    resetConfig();
  });

  it('applies defaults', () => {
    delete process.env.PINGWATCH_TARGET;
    delete process.env.PINGWATCH_TRACE;
    delete process.env.PINGWATCH_INTERVAL_MS;
    delete process.env.PINGWATCH_TIMEOUT_MS;

    const config = getConfig();

    expect(config.PINGWATCH_TARGET).toBeUndefined();
    expect(config.PINGWATCH_TRACE).toBe(false);
    expect(config.PINGWATCH_INTERVAL_MS).toBe(60000);
    expect(config.PINGWATCH_TIMEOUT_MS).toBe(30000);
    expect(config.PINGWATCH_PROBE_COUNT).toBe(1);
    expect(config.PINGWATCH_PING_BIN).toBe('ping');
    expect(isTest()).toBe(true);
  });

  it('reads the environment', () => {
    process.env.PINGWATCH_TARGET = 'example.test';
    process.env.PINGWATCH_TRACE = 'true';
    process.env.PINGWATCH_CUTOFF_MULTIPLIER = '2.5';

    const config = getConfig();

    expect(config.PINGWATCH_TARGET).toBe('example.test');
    expect(config.PINGWATCH_TRACE).toBe(true);
    expect(config.PINGWATCH_CUTOFF_MULTIPLIER).toBe(2.5);
  });

  it('caches until reset', () => {
    process.env.PINGWATCH_TARGET = 'first.test';
    expect(getConfig().PINGWATCH_TARGET).toBe('first.test');

    process.env.PINGWATCH_TARGET = 'second.test';
    expect(getConfig().PINGWATCH_TARGET).toBe('first.test');

    resetConfig();
    expect(getConfig().PINGWATCH_TARGET).toBe('second.test');
  });

  it('rejects invalid values', () => {
    process.env.PINGWATCH_TIMEOUT_MS = 'soon';

    expect(() => getConfig()).toThrow(ConfigurationError);
  });

  it.each([
    ['PINGWATCH_INTERVAL_MS', 'abc'],
    ['PINGWATCH_OUTAGE_THRESHOLD', '0'],
    ['PINGWATCH_ANOMALY_THRESHOLD', '2.5'],
    ['PINGWATCH_BASELINE_WINDOW', '-1'],
    ['PINGWATCH_CUTOFF_MULTIPLIER', 'abc']
  ])('names %s when it holds %s', (name, value) => {
    process.env[name] = value;

    expect(() => getConfig()).toThrow(name);
  });
});
