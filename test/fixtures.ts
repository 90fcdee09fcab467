import type { AppConfig } from '../src/types/index.js';

/** Settings used by session tests, independent of the persisted store */
export const TEST_SETTINGS: AppConfig = {
  interval: '60',
  count: 10,
  preferredCountry: 'ru',
  fallbackExits: 'de,nl',
  torrcPath: '',
  serviceName: 'tor',
  processName: 'tor',
  socksHost: '127.0.0.1',
  socksPort: 9050,
  probeUrl: 'https://ip.test',
  connectivityUrl: 'http://reachable.test',
  logLevel: 'info',
};
