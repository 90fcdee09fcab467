import Conf from 'conf';
import type { AppConfig } from '../types/index.js';

// Default application configuration
export const DEFAULT_CONFIG: AppConfig = {
  interval: '60',
  count: 10,
  preferredCountry: 'ru',
  fallbackExits: 'de,nl,fr,pl,se,fi,lt,lv,ee',
  torrcPath: '', // auto-detect
  serviceName: 'tor',
  processName: 'tor',
  socksHost: '127.0.0.1',
  socksPort: 9050,
  probeUrl: 'https://api.ipify.org',
  connectivityUrl: 'http://www.google.com',
  logLevel: 'info',
};

const configStore = new Conf<AppConfig>({
  projectName: 'relay-rotator',
  defaults: DEFAULT_CONFIG,
});

/**
 * Get the current application configuration
 */
export function getConfig(): AppConfig {
  return configStore.store;
}

/**
 * Update the application configuration
 */
export function updateConfig(partialConfig: Partial<AppConfig>): AppConfig {
  const updatedConfig = { ...getConfig(), ...partialConfig };
  configStore.store = updatedConfig;
  return updatedConfig;
}

/**
 * Reset configuration to defaults
 */
export function resetConfig(): void {
  configStore.clear();
}

/**
 * Location of the persisted settings file
 */
export function getConfigPath(): string {
  return configStore.path;
}
