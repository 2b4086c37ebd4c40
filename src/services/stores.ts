// src/services/stores.ts
import { optionalSetting, requireSetting } from '../source/index.js';
import { SERVICES } from './catalog.js';
import type {
  AstraDBSettings,
  AzureCosmosDBSettings,
  LoadedSettings,
  PineconeSettings,
  WeaviateSettings,
} from '../types.js';

export function postgresSettings(settings: LoadedSettings): string {
  return requireSetting(settings, 'POSTGRES_CONNECTION_STRING', SERVICES.postgres.label);
}

export function pineconeSettings(settings: LoadedSettings): PineconeSettings {
  const { label } = SERVICES.pinecone;
  return [
    requireSetting(settings, 'PINECONE_API_KEY', label),
    requireSetting(settings, 'PINECONE_ENVIRONMENT', label),
  ];
}

export function astraDBSettings(settings: LoadedSettings): AstraDBSettings {
  const { label } = SERVICES.astraDB;
  return [
    requireSetting(settings, 'ASTRADB_APP_TOKEN', label),
    requireSetting(settings, 'ASTRADB_ID', label),
    requireSetting(settings, 'ASTRADB_REGION', label),
    requireSetting(settings, 'ASTRADB_KEYSPACE', label),
  ];
}

export function weaviateSettings(settings: LoadedSettings): WeaviateSettings {
  const url = requireSetting(settings, 'WEAVIATE_URL', SERVICES.weaviate.label);
  return [optionalSetting(settings, 'WEAVIATE_API_KEY'), url];
}

export function mongoDBAtlasSettings(settings: LoadedSettings): string {
  return requireSetting(settings, 'MONGODB_ATLAS_CONNECTION_STRING', SERVICES.mongoDBAtlas.label);
}

export function azureCosmosDBSettings(settings: LoadedSettings): AzureCosmosDBSettings {
  const connectionString = requireSetting(settings, 'AZCOSMOS_CONNSTR', SERVICES.azureCosmosDB.label);
  return [optionalSetting(settings, 'AZCOSMOS_API'), connectionString];
}

export function redisSettings(settings: LoadedSettings): string {
  return requireSetting(settings, 'REDIS_CONNECTION_STRING', SERVICES.redis.label);
}
