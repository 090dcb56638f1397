import '../config.js';

export const DEFAULT_BASE_URL = 'https://api.openai.com/v1';
export const DEFAULT_TIMEOUT_MS = 60_000;

/**
 * Centralized configuration. All environment variables are read and
 * validated here.
 */
export class AppConfig {
  readonly upstream = {
    apiKey: this.getOptionalString('OPENAI_API_KEY'),
    baseUrl: this.getString('OPENAI_BASE_URL', DEFAULT_BASE_URL).replace(/\/+$/, ''),
    timeoutMs: this.getNumber('BRIDGE_TIMEOUT_MS', DEFAULT_TIMEOUT_MS),
  };

  readonly logging = {
    level: this.getString('LOG_LEVEL', 'info'),
    file: this.getOptionalString('LOG_FILE'),
  };

  readonly features = {
    validateRequests: this.getBoolean('BRIDGE_VALIDATE_REQUESTS', true),
  };

  private getString(key: string, defaultValue: string): string {
    return process.env[key] || defaultValue;
  }

  private getOptionalString(key: string): string | undefined {
    return process.env[key] || undefined;
  }

  private getNumber(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (!value) return defaultValue;
    const num = parseInt(value, 10);
    if (isNaN(num) || num <= 0) {
      throw new Error(`Invalid number for environment variable ${key}: ${value}`);
    }
    return num;
  }

  private getBoolean(key: string, defaultValue: boolean): boolean {
    const value = process.env[key];
    if (!value) return defaultValue;
    return value.toLowerCase() === 'true' || value === '1';
  }
}

// Singleton instance
let configInstance: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!configInstance) {
    configInstance = new AppConfig();
  }
  return configInstance;
}

// For testing - reset config
export function resetConfig(): void {
  configInstance = null;
}
