// src/index.ts
export { ServiceSettings, DEFAULT_ENV_FILE } from './client.js';
export { readSettings, parseSettings, requireSetting, optionalSetting } from './source/index.js';
export {
  SERVICES,
  SERVICE_IDS,
  missingKeys,
  openAISettings,
  azureOpenAISettings,
  azureOpenAISettingsAsDict,
  googlePalmSettings,
  postgresSettings,
  pineconeSettings,
  astraDBSettings,
  weaviateSettings,
  mongoDBAtlasSettings,
  azureCosmosDBSettings,
  redisSettings,
  bingSearchSettings,
  azureAISearchSettings,
  azureAISearchSettingsAsDict,
  azureKeyVaultSettings,
  azureKeyVaultSettingsAsDict,
  bookingSampleSettings,
  bookingSampleSettingsAsDict,
} from './services/index.js';
export type {
  SettingsMap,
  LoadedSettings,
  ServiceSettingsOptions,
  ServiceId,
  ServiceDescriptor,
  OpenAISettings,
  AzureOpenAISettings,
  AzureOpenAISettingsWithVersion,
  AzureOpenAIOptions,
  AzureOpenAISettingsDict,
  PineconeSettings,
  AstraDBSettings,
  WeaviateSettings,
  AzureCosmosDBSettings,
  AzureAISearchSettings,
  AzureAISearchSettingsWithIndex,
  AzureAISearchOptions,
  AzureAISearchSettingsDict,
  AzureKeyVaultSettings,
  AzureKeyVaultOptions,
  AzureKeyVaultSettingsDict,
  BookingSampleSettings,
  BookingSampleSettingsDict,
} from './types.js';
export { ServiceSettingsError, MissingConfigurationError, ConfigurationSourceError } from './errors.js';
