// tests/services/identity.test.ts
import { describe, it, expect } from 'vitest';
import {
  azureKeyVaultSettings,
  azureKeyVaultSettingsAsDict,
  bookingSampleSettings,
  bookingSampleSettingsAsDict,
} from '../../src/services/identity.js';
import { MissingConfigurationError } from '../../src/errors.js';
import type { LoadedSettings } from '../../src/types.js';

const loaded = (values: Record<string, string>): LoadedSettings => ({ path: '.env', values });

const VAULT = {
  AZURE_KEY_VAULT_ENDPOINT: 'https://vault.example.net',
  AZURE_KEY_VAULT_CLIENT_ID: 'client-id',
  AZURE_KEY_VAULT_CLIENT_SECRET: 'test-secret',
};

const BOOKING = {
  BOOKING_SAMPLE_CLIENT_ID: 'booking-client',
  BOOKING_SAMPLE_TENANT_ID: 'booking-tenant',
  BOOKING_SAMPLE_CLIENT_SECRET: 'test-secret',
};

describe('azureKeyVaultSettings', () => {
  it('returns endpoint, client id and secret', () => {
    expect(azureKeyVaultSettings(loaded(VAULT))).toEqual([
      'https://vault.example.net',
      'client-id',
      'test-secret',
    ]);
  });

  it('requires client id and secret by default', () => {
    const settings = loaded({ AZURE_KEY_VAULT_ENDPOINT: 'https://vault.example.net' });
    expect(() => azureKeyVaultSettings(settings)).toThrow(
      'Missing configuration: Azure Key Vault AZURE_KEY_VAULT_CLIENT_ID not found in .env',
    );
  });

  it('leaves unrequested credentials optional', () => {
    const settings = loaded({ AZURE_KEY_VAULT_ENDPOINT: 'https://vault.example.net' });
    expect(azureKeyVaultSettings(settings, { includeClientId: false, includeClientSecret: false })).toEqual([
      'https://vault.example.net',
      undefined,
      undefined,
    ]);
  });

  it('leaves out a credential that was not requested even when the file defines it', () => {
    const settings = loaded(VAULT);
    expect(azureKeyVaultSettings(settings, { includeClientSecret: false })).toEqual([
      'https://vault.example.net',
      'client-id',
      undefined,
    ]);
    expect(azureKeyVaultSettings(settings, { includeClientId: false })).toEqual([
      'https://vault.example.net',
      undefined,
      'test-secret',
    ]);
  });

  it('always requires the endpoint', () => {
    const settings = loaded({ AZURE_KEY_VAULT_CLIENT_ID: 'client-id' });
    expect(() => azureKeyVaultSettings(settings, { includeClientId: false, includeClientSecret: false })).toThrow(
      MissingConfigurationError,
    );
  });
});

describe('azureKeyVaultSettingsAsDict', () => {
  it('names the tuple fields', () => {
    expect(azureKeyVaultSettingsAsDict(loaded(VAULT))).toEqual({
      endpoint: 'https://vault.example.net',
      clientId: 'client-id',
      clientSecret: 'test-secret',
    });
  });

  it('requires the client secret', () => {
    const values: Record<string, string> = { ...VAULT };
    delete values.AZURE_KEY_VAULT_CLIENT_SECRET;
    expect(() => azureKeyVaultSettingsAsDict(loaded(values))).toThrow(MissingConfigurationError);
  });
});

describe('bookingSampleSettings', () => {
  it('returns client id, tenant id and secret', () => {
    expect(bookingSampleSettings(loaded(BOOKING))).toEqual(['booking-client', 'booking-tenant', 'test-secret']);
  });

  it.each(Object.keys(BOOKING))('throws when %s is empty', key => {
    const settings = loaded({ ...BOOKING, [key]: '' });
    expect(() => bookingSampleSettings(settings)).toThrow(
      `Missing configuration: Booking Sample ${key} not found in .env`,
    );
  });

  it('projects to a dict with the same values', () => {
    const [clientId, tenantId, clientSecret] = bookingSampleSettings(loaded(BOOKING));
    expect(bookingSampleSettingsAsDict(loaded(BOOKING))).toEqual({ clientId, tenantId, clientSecret });
  });
});
