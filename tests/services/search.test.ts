// tests/services/search.test.ts
import { describe, it, expect } from 'vitest';
import { bingSearchSettings, azureAISearchSettings, azureAISearchSettingsAsDict } from '../../src/services/search.js';
import { MissingConfigurationError } from '../../src/errors.js';
import type { LoadedSettings } from '../../src/types.js';

const loaded = (values: Record<string, string>): LoadedSettings => ({ path: '.env', values });

const SEARCH = {
  AZURE_AISEARCH_API_KEY: 'search-key',
  AZURE_AISEARCH_URL: 'https://search.example.net',
  AZURE_AISEARCH_INDEX_NAME: 'docs',
};

const BING_UNSET: Record<string, string>[] = [{}, { BING_API_KEY: '' }];

describe('bingSearchSettings', () => {
  it('returns the API key', () => {
    expect(bingSearchSettings(loaded({ BING_API_KEY: 'bing-test' }))).toBe('bing-test');
  });

  it.each(BING_UNSET)('throws when the API key is missing or empty (%o)', values => {
    expect(() => bingSearchSettings(loaded(values))).toThrow(
      'Missing configuration: Bing Search BING_API_KEY not found in .env',
    );
  });
});

describe('azureAISearchSettings', () => {
  it('returns key and url by default', () => {
    expect(azureAISearchSettings(loaded(SEARCH))).toEqual(['search-key', 'https://search.example.net']);
  });

  it('appends the index name when requested', () => {
    expect(azureAISearchSettings(loaded(SEARCH), { includeIndexName: true })).toEqual([
      'search-key',
      'https://search.example.net',
      'docs',
    ]);
  });

  it('does not require the index name unless requested', () => {
    const settings = loaded({ AZURE_AISEARCH_API_KEY: 'search-key', AZURE_AISEARCH_URL: 'https://s' });
    expect(azureAISearchSettings(settings)).toEqual(['search-key', 'https://s']);
    expect(() => azureAISearchSettings(settings, { includeIndexName: true })).toThrow(
      'Missing configuration: Azure AI Search AZURE_AISEARCH_INDEX_NAME not found in .env',
    );
  });

  it('requires the url and the key', () => {
    expect(() => azureAISearchSettings(loaded({ AZURE_AISEARCH_API_KEY: 'k' }))).toThrow(MissingConfigurationError);
    expect(() => azureAISearchSettings(loaded({ AZURE_AISEARCH_URL: 'https://s' }))).toThrow(MissingConfigurationError);
  });
});

describe('azureAISearchSettingsAsDict', () => {
  it('shapes the settings for a data source configuration', () => {
    expect(azureAISearchSettingsAsDict(loaded(SEARCH))).toEqual({
      authentication: { type: 'api_key', key: 'search-key' },
      endpoint: 'https://search.example.net',
      indexName: 'docs',
    });
  });

  it('always requires the index name', () => {
    const settings = loaded({ AZURE_AISEARCH_API_KEY: 'k', AZURE_AISEARCH_URL: 'https://s' });
    expect(() => azureAISearchSettingsAsDict(settings)).toThrow(MissingConfigurationError);
  });
});
