// src/services/search.ts
import { requireSetting } from '../source/index.js';
import { SERVICES } from './catalog.js';
import type {
  AzureAISearchOptions,
  AzureAISearchSettings,
  AzureAISearchSettingsDict,
  AzureAISearchSettingsWithIndex,
  LoadedSettings,
} from '../types.js';

export function bingSearchSettings(settings: LoadedSettings): string {
  return requireSetting(settings, 'BING_API_KEY', SERVICES.bingSearch.label);
}

export function azureAISearchSettings(
  settings: LoadedSettings,
  options: AzureAISearchOptions & { includeIndexName: true },
): AzureAISearchSettingsWithIndex;
export function azureAISearchSettings(
  settings: LoadedSettings,
  options?: AzureAISearchOptions & { includeIndexName?: false },
): AzureAISearchSettings;
export function azureAISearchSettings(
  settings: LoadedSettings,
  options?: AzureAISearchOptions,
): AzureAISearchSettings | AzureAISearchSettingsWithIndex;
export function azureAISearchSettings(
  settings: LoadedSettings,
  options: AzureAISearchOptions = {},
): AzureAISearchSettings | AzureAISearchSettingsWithIndex {
  const { label } = SERVICES.azureAISearch;
  const url = requireSetting(settings, 'AZURE_AISEARCH_URL', label);
  const apiKey = requireSetting(settings, 'AZURE_AISEARCH_API_KEY', label);
  if (!options.includeIndexName) return [apiKey, url];
  return [apiKey, url, requireSetting(settings, 'AZURE_AISEARCH_INDEX_NAME', label)];
}

// Shape expected by Azure AI Search data source configuration
export function azureAISearchSettingsAsDict(settings: LoadedSettings): AzureAISearchSettingsDict {
  const [key, endpoint, indexName] = azureAISearchSettings(settings, { includeIndexName: true });
  return { authentication: { type: 'api_key', key }, endpoint, indexName };
}
