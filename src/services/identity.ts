// src/services/identity.ts
import { requireSetting } from '../source/index.js';
import { SERVICES } from './catalog.js';
import type {
  AzureKeyVaultOptions,
  AzureKeyVaultSettings,
  AzureKeyVaultSettingsDict,
  BookingSampleSettings,
  BookingSampleSettingsDict,
  LoadedSettings,
} from '../types.js';

/**
 * Key Vault endpoint with its client credentials. Client id and secret are
 * required by default; turning a flag off leaves that slot `undefined`.
 */
export function azureKeyVaultSettings(settings: LoadedSettings): readonly [string, string, string];
export function azureKeyVaultSettings(
  settings: LoadedSettings,
  options: AzureKeyVaultOptions,
): AzureKeyVaultSettings;
export function azureKeyVaultSettings(
  settings: LoadedSettings,
  options: AzureKeyVaultOptions = {},
): AzureKeyVaultSettings {
  const { label } = SERVICES.azureKeyVault;
  const endpoint = requireSetting(settings, 'AZURE_KEY_VAULT_ENDPOINT', label);
  const clientId = (options.includeClientId ?? true)
    ? requireSetting(settings, 'AZURE_KEY_VAULT_CLIENT_ID', label)
    : undefined;
  const clientSecret = (options.includeClientSecret ?? true)
    ? requireSetting(settings, 'AZURE_KEY_VAULT_CLIENT_SECRET', label)
    : undefined;
  return [endpoint, clientId, clientSecret];
}

export function azureKeyVaultSettingsAsDict(settings: LoadedSettings): AzureKeyVaultSettingsDict {
  const [endpoint, clientId, clientSecret] = azureKeyVaultSettings(settings);
  return { endpoint, clientId, clientSecret };
}

export function bookingSampleSettings(settings: LoadedSettings): BookingSampleSettings {
  const { label } = SERVICES.bookingSample;
  return [
    requireSetting(settings, 'BOOKING_SAMPLE_CLIENT_ID', label),
    requireSetting(settings, 'BOOKING_SAMPLE_TENANT_ID', label),
    requireSetting(settings, 'BOOKING_SAMPLE_CLIENT_SECRET', label),
  ];
}

export function bookingSampleSettingsAsDict(settings: LoadedSettings): BookingSampleSettingsDict {
  const [clientId, tenantId, clientSecret] = bookingSampleSettings(settings);
  return { clientId, tenantId, clientSecret };
}
