// src/errors.ts
export class ServiceSettingsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class MissingConfigurationError extends ServiceSettingsError {
  constructor(
    public readonly key: string,
    public readonly service: string,
    public readonly source: string,
  ) {
    super(`Missing configuration: ${service} ${key} not found in ${source}`);
  }
}

export class ConfigurationSourceError extends ServiceSettingsError {
  constructor(public readonly source: string, detail: string) {
    super(`Configuration source unreadable: ${source} (${detail})`);
  }
}
