// src/types.ts

export type SettingsMap = Readonly<Record<string, string>>;

export interface LoadedSettings {
  path: string;
  values: SettingsMap;
}

export interface ServiceSettingsOptions {
  envFile?: string; // relative to cwd unless absolute
  cwd?: string;
}

export type ServiceId =
  | 'openai'
  | 'azureOpenAI'
  | 'postgres'
  | 'pinecone'
  | 'astraDB'
  | 'weaviate'
  | 'bingSearch'
  | 'mongoDBAtlas'
  | 'googlePalm'
  | 'azureCosmosDB'
  | 'redis'
  | 'azureAISearch'
  | 'azureKeyVault'
  | 'bookingSample';

export interface ServiceDescriptor {
  label: string;
  required: readonly string[];
  optional: readonly string[];
}

// Result bundles

export type OpenAISettings = readonly [apiKey: string, orgId: string | undefined];

export type AzureOpenAISettings = readonly [deploymentName: string, apiKey: string, endpoint: string];

export type AzureOpenAISettingsWithVersion = readonly [
  deploymentName: string,
  apiKey: string,
  endpoint: string,
  apiVersion: string,
];

export interface AzureOpenAIOptions {
  includeDeployment?: boolean; // default true
  includeApiVersion?: boolean; // default false
}

export interface AzureOpenAISettingsDict {
  apiKey: string;
  endpoint: string;
  deploymentName?: string;
  apiVersion?: string;
}

export type PineconeSettings = readonly [apiKey: string, environment: string];

export type AstraDBSettings = readonly [appToken: string, dbId: string, region: string, keyspace: string];

export type WeaviateSettings = readonly [apiKey: string | undefined, url: string];

export type AzureCosmosDBSettings = readonly [api: string | undefined, connectionString: string];

export type AzureAISearchSettings = readonly [apiKey: string, url: string];

export type AzureAISearchSettingsWithIndex = readonly [apiKey: string, url: string, indexName: string];

export interface AzureAISearchOptions {
  includeIndexName?: boolean; // default false
}

export interface AzureAISearchSettingsDict {
  authentication: { type: 'api_key'; key: string };
  endpoint: string;
  indexName: string;
}

export type AzureKeyVaultSettings = readonly [
  endpoint: string,
  clientId: string | undefined,
  clientSecret: string | undefined,
];

export interface AzureKeyVaultOptions {
  includeClientId?: boolean; // default true
  includeClientSecret?: boolean; // default true
}

export interface AzureKeyVaultSettingsDict {
  endpoint: string;
  clientId: string;
  clientSecret: string;
}

export type BookingSampleSettings = readonly [clientId: string, tenantId: string, clientSecret: string];

export interface BookingSampleSettingsDict {
  clientId: string;
  tenantId: string;
  clientSecret: string;
}
