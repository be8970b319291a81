import { describe, expect, it } from 'vitest';
import { loadConfig } from '../config.js';
import { ConfigError } from '../errors.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 8787,
      dataDir: 'data',
      outputDir: '.',
      histogramBins: 20,
      apiKeys: [],
      supabase: null,
    });
  });

  it('reads overrides and treats blank values as unset', () => {
    const config = loadConfig({
      PORT: '9000',
      HISTOGRAM_BINS: '10',
      API_KEYS: 'test-key, other-key,',
      SUPABASE_URL: 'http://localhost:54321',
      SUPABASE_ANON_KEY: 'test-anon',
      DATA_DIR: '  ',
    });
    expect(config.port).toBe(9000);
    expect(config.histogramBins).toBe(10);
    expect(config.apiKeys).toEqual(['test-key', 'other-key']);
    expect(config.supabase).toEqual({ url: 'http://localhost:54321', anonKey: 'test-anon' });
    expect(config.dataDir).toBe('data');
  });

  it('needs both Supabase settings to enable publishing', () => {
    expect(loadConfig({ SUPABASE_URL: 'http://localhost:54321' }).supabase).toBeNull();
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(ConfigError);
    expect(() => loadConfig({ HISTOGRAM_BINS: '0' })).toThrow(/HISTOGRAM_BINS/);
  });
});
