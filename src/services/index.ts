// src/services/index.ts
export { SERVICES, SERVICE_IDS, missingKeys } from './catalog.js';
export { openAISettings, azureOpenAISettings, azureOpenAISettingsAsDict, googlePalmSettings } from './openai.js';
export {
  postgresSettings,
  pineconeSettings,
  astraDBSettings,
  weaviateSettings,
  mongoDBAtlasSettings,
  azureCosmosDBSettings,
  redisSettings,
} from './stores.js';
export { bingSearchSettings, azureAISearchSettings, azureAISearchSettingsAsDict } from './search.js';
export {
  azureKeyVaultSettings,
  azureKeyVaultSettingsAsDict,
  bookingSampleSettings,
  bookingSampleSettingsAsDict,
} from './identity.js';
