// src/services/catalog.ts
import { optionalSetting } from '../source/index.js';
import type { LoadedSettings, ServiceDescriptor, ServiceId } from '../types.js';

export const SERVICES: Readonly<Record<ServiceId, ServiceDescriptor>> = {
  openai: {
    label: 'OpenAI',
    required: ['OPENAI_API_KEY'],
    optional: ['OPENAI_ORG_ID'],
  },
  azureOpenAI: {
    label: 'Azure OpenAI',
    required: ['AZURE_OPENAI_API_KEY', 'AZURE_OPENAI_ENDPOINT'],
    optional: ['AZURE_OPENAI_DEPLOYMENT_NAME', 'AZURE_OPENAI_API_VERSION'],
  },
  postgres: {
    label: 'Postgres',
    required: ['POSTGRES_CONNECTION_STRING'],
    optional: [],
  },
  pinecone: {
    label: 'Pinecone',
    required: ['PINECONE_API_KEY', 'PINECONE_ENVIRONMENT'],
    optional: [],
  },
  astraDB: {
    label: 'AstraDB',
    required: ['ASTRADB_APP_TOKEN', 'ASTRADB_ID', 'ASTRADB_REGION', 'ASTRADB_KEYSPACE'],
    optional: [],
  },
  weaviate: {
    label: 'Weaviate',
    required: ['WEAVIATE_URL'],
    optional: ['WEAVIATE_API_KEY'], // local deployments run without a key
  },
  bingSearch: {
    label: 'Bing Search',
    required: ['BING_API_KEY'],
    optional: [],
  },
  mongoDBAtlas: {
    label: 'MongoDB Atlas',
    required: ['MONGODB_ATLAS_CONNECTION_STRING'],
    optional: [],
  },
  googlePalm: {
    label: 'Google PaLM',
    required: ['GOOGLE_PALM_API_KEY'],
    optional: [],
  },
  azureCosmosDB: {
    label: 'Azure Cosmos DB',
    required: ['AZCOSMOS_CONNSTR'],
    optional: ['AZCOSMOS_API'],
  },
  redis: {
    label: 'Redis',
    required: ['REDIS_CONNECTION_STRING'],
    optional: [],
  },
  azureAISearch: {
    label: 'Azure AI Search',
    required: ['AZURE_AISEARCH_API_KEY', 'AZURE_AISEARCH_URL'],
    optional: ['AZURE_AISEARCH_INDEX_NAME'],
  },
  azureKeyVault: {
    label: 'Azure Key Vault',
    required: ['AZURE_KEY_VAULT_ENDPOINT'],
    optional: ['AZURE_KEY_VAULT_CLIENT_ID', 'AZURE_KEY_VAULT_CLIENT_SECRET'],
  },
  bookingSample: {
    label: 'Booking Sample',
    required: ['BOOKING_SAMPLE_CLIENT_ID', 'BOOKING_SAMPLE_TENANT_ID', 'BOOKING_SAMPLE_CLIENT_SECRET'],
    optional: [],
  },
};

export const SERVICE_IDS: readonly ServiceId[] = [
  'openai',
  'azureOpenAI',
  'postgres',
  'pinecone',
  'astraDB',
  'weaviate',
  'bingSearch',
  'mongoDBAtlas',
  'googlePalm',
  'azureCosmosDB',
  'redis',
  'azureAISearch',
  'azureKeyVault',
  'bookingSample',
];

export function missingKeys(settings: LoadedSettings, service: ServiceId): string[] {
  return SERVICES[service].required.filter(key => optionalSetting(settings, key) === undefined);
}
