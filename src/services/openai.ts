// src/services/openai.ts
import { optionalSetting, requireSetting } from '../source/index.js';
import { SERVICES } from './catalog.js';
import type {
  AzureOpenAIOptions,
  AzureOpenAISettings,
  AzureOpenAISettingsDict,
  AzureOpenAISettingsWithVersion,
  LoadedSettings,
  OpenAISettings,
} from '../types.js';

export function openAISettings(settings: LoadedSettings): OpenAISettings {
  const apiKey = requireSetting(settings, 'OPENAI_API_KEY', SERVICES.openai.label);
  // Organization id is optional
  return [apiKey, optionalSetting(settings, 'OPENAI_ORG_ID')];
}

/**
 * Deployment name, API key and endpoint for Azure OpenAI, plus the API
 * version when `includeApiVersion` is set.
 *
 * The deployment name is required unless `includeDeployment` is false, in
 * which case it comes back as `''` when the file does not define it.
 */
export function azureOpenAISettings(
  settings: LoadedSettings,
  options: AzureOpenAIOptions & { includeApiVersion: true },
): AzureOpenAISettingsWithVersion;
export function azureOpenAISettings(
  settings: LoadedSettings,
  options?: AzureOpenAIOptions & { includeApiVersion?: false },
): AzureOpenAISettings;
export function azureOpenAISettings(
  settings: LoadedSettings,
  options?: AzureOpenAIOptions,
): AzureOpenAISettings | AzureOpenAISettingsWithVersion;
export function azureOpenAISettings(
  settings: LoadedSettings,
  options: AzureOpenAIOptions = {},
): AzureOpenAISettings | AzureOpenAISettingsWithVersion {
  const { label } = SERVICES.azureOpenAI;
  const includeDeployment = options.includeDeployment ?? true;
  const includeApiVersion = options.includeApiVersion ?? false;

  const deploymentName = includeDeployment
    ? requireSetting(settings, 'AZURE_OPENAI_DEPLOYMENT_NAME', label)
    : optionalSetting(settings, 'AZURE_OPENAI_DEPLOYMENT_NAME') ?? '';
  const apiVersion = includeApiVersion
    ? requireSetting(settings, 'AZURE_OPENAI_API_VERSION', label)
    : undefined;
  const apiKey = requireSetting(settings, 'AZURE_OPENAI_API_KEY', label);
  const endpoint = requireSetting(settings, 'AZURE_OPENAI_ENDPOINT', label);

  if (apiVersion !== undefined) return [deploymentName, apiKey, endpoint, apiVersion];
  return [deploymentName, apiKey, endpoint];
}

export function azureOpenAISettingsAsDict(
  settings: LoadedSettings,
  options: AzureOpenAIOptions = {},
): AzureOpenAISettingsDict {
  const bundle = azureOpenAISettings(settings, options);
  const dict: AzureOpenAISettingsDict = { apiKey: bundle[1], endpoint: bundle[2] };
  if (options.includeDeployment ?? true) dict.deploymentName = bundle[0];
  if (bundle.length === 4) dict.apiVersion = bundle[3];
  return dict;
}

export function googlePalmSettings(settings: LoadedSettings): string {
  return requireSetting(settings, 'GOOGLE_PALM_API_KEY', SERVICES.googlePalm.label);
}
