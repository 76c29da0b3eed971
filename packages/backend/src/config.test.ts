import { describe, it, expect, vi, afterEach } from 'vitest';
import { load_config, parse_positive_int } from './config.js';

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('parse_positive_int', () => {
  it('parses positive integers', () => {
    expect(parse_positive_int('50', 200)).toBe(50);
  });

  it('falls back on malformed or non-positive values', () => {
    expect(parse_positive_int('lots', 200)).toBe(200);
    expect(parse_positive_int('0', 200)).toBe(200);
    expect(parse_positive_int('-5', 200)).toBe(200);
  });
});

describe('load_config', () => {
  it('keeps the default sync limit when SYNC_MAX_MESSAGES is malformed', () => {
    vi.stubEnv('SYNC_MAX_MESSAGES', 'abc');

    expect(load_config().sync_max_messages).toBe(200);
  });

  it('reads a valid SYNC_MAX_MESSAGES', () => {
    vi.stubEnv('SYNC_MAX_MESSAGES', '25');

    expect(load_config().sync_max_messages).toBe(25);
  });
});
