// src/client.ts
import { resolve } from 'node:path';
import { readSettings } from './source/index.js';
import { SERVICE_IDS, missingKeys } from './services/catalog.js';
import { openAISettings, azureOpenAISettings, azureOpenAISettingsAsDict, googlePalmSettings } from './services/openai.js';
import {
  postgresSettings,
  pineconeSettings,
  astraDBSettings,
  weaviateSettings,
  mongoDBAtlasSettings,
  azureCosmosDBSettings,
  redisSettings,
} from './services/stores.js';
import { bingSearchSettings, azureAISearchSettings, azureAISearchSettingsAsDict } from './services/search.js';
import {
  azureKeyVaultSettings,
  azureKeyVaultSettingsAsDict,
  bookingSampleSettings,
  bookingSampleSettingsAsDict,
} from './services/identity.js';
import type {
  AstraDBSettings,
  AzureAISearchOptions,
  AzureAISearchSettings,
  AzureAISearchSettingsDict,
  AzureAISearchSettingsWithIndex,
  AzureCosmosDBSettings,
  AzureKeyVaultOptions,
  AzureKeyVaultSettings,
  AzureKeyVaultSettingsDict,
  AzureOpenAIOptions,
  AzureOpenAISettings,
  AzureOpenAISettingsDict,
  AzureOpenAISettingsWithVersion,
  BookingSampleSettings,
  BookingSampleSettingsDict,
  LoadedSettings,
  OpenAISettings,
  PineconeSettings,
  ServiceId,
  ServiceSettingsOptions,
  WeaviateSettings,
} from './types.js';

export const DEFAULT_ENV_FILE = '.env';

/**
 * Per-service credential bundles read from a `.env` file.
 *
 * Every accessor re-reads the file, so edits are picked up on the next call
 * and nothing is held between calls.
 */
export class ServiceSettings {
  readonly path: string;

  constructor(options: ServiceSettingsOptions = {}) {
    this.path = resolve(options.cwd ?? process.cwd(), options.envFile ?? DEFAULT_ENV_FILE);
  }

  openAI(): OpenAISettings {
    return openAISettings(this.load());
  }

  azureOpenAI(options: AzureOpenAIOptions & { includeApiVersion: true }): AzureOpenAISettingsWithVersion;
  azureOpenAI(options?: AzureOpenAIOptions & { includeApiVersion?: false }): AzureOpenAISettings;
  azureOpenAI(options?: AzureOpenAIOptions): AzureOpenAISettings | AzureOpenAISettingsWithVersion;
  azureOpenAI(options: AzureOpenAIOptions = {}): AzureOpenAISettings | AzureOpenAISettingsWithVersion {
    return azureOpenAISettings(this.load(), options);
  }

  azureOpenAIAsDict(options: AzureOpenAIOptions = {}): AzureOpenAISettingsDict {
    return azureOpenAISettingsAsDict(this.load(), options);
  }

  postgres(): string {
    return postgresSettings(this.load());
  }

  pinecone(): PineconeSettings {
    return pineconeSettings(this.load());
  }

  astraDB(): AstraDBSettings {
    return astraDBSettings(this.load());
  }

  weaviate(): WeaviateSettings {
    return weaviateSettings(this.load());
  }

  bingSearch(): string {
    return bingSearchSettings(this.load());
  }

  mongoDBAtlas(): string {
    return mongoDBAtlasSettings(this.load());
  }

  googlePalm(): string {
    return googlePalmSettings(this.load());
  }

  azureCosmosDB(): AzureCosmosDBSettings {
    return azureCosmosDBSettings(this.load());
  }

  redis(): string {
    return redisSettings(this.load());
  }

  azureAISearch(options: AzureAISearchOptions & { includeIndexName: true }): AzureAISearchSettingsWithIndex;
  azureAISearch(options?: AzureAISearchOptions & { includeIndexName?: false }): AzureAISearchSettings;
  azureAISearch(options?: AzureAISearchOptions): AzureAISearchSettings | AzureAISearchSettingsWithIndex;
  azureAISearch(options: AzureAISearchOptions = {}): AzureAISearchSettings | AzureAISearchSettingsWithIndex {
    return azureAISearchSettings(this.load(), options);
  }

  azureAISearchAsDict(): AzureAISearchSettingsDict {
    return azureAISearchSettingsAsDict(this.load());
  }

  azureKeyVault(options: AzureKeyVaultOptions = {}): AzureKeyVaultSettings {
    return azureKeyVaultSettings(this.load(), options);
  }

  azureKeyVaultAsDict(): AzureKeyVaultSettingsDict {
    return azureKeyVaultSettingsAsDict(this.load());
  }

  bookingSample(): BookingSampleSettings {
    return bookingSampleSettings(this.load());
  }

  bookingSampleAsDict(): BookingSampleSettingsDict {
    return bookingSampleSettingsAsDict(this.load());
  }

  check(service: ServiceId): string[] {
    return missingKeys(this.load(), service);
  }

  configuredServices(): ServiceId[] {
    const settings = this.load();
    return SERVICE_IDS.filter(id => missingKeys(settings, id).length === 0);
  }

  private load(): LoadedSettings {
    return readSettings(this.path);
  }
}
