import { config as dotenvConfig } from 'dotenv';
import * as path from 'path';

dotenvConfig();

export type InvalidRegexMode = 'skip' | 'fail';

export interface Config {
  port: number;
  host: string;
  dataPath: string;
  sortFile: string;
  debug: boolean;
  realdebrid: {
    apiKey: string;
    apiUrl: string;
    timeout: number; // ms
  };
  refreshInterval: number; // seconds
  sortFileDebounce: number; // seconds
  pageSize: number;
  retry: {
    attempts: number;
    delay: number; // ms
  };
  recovery: {
    pollAttempts: number;
    pollDelay: number; // ms
  };
  invalidRegex: InvalidRegexMode;
  watchSortFile: boolean;
}

let config: Config | null = null;

function parseInvalidRegexMode(value: string | undefined): InvalidRegexMode {
  return value === 'fail' ? 'fail' : 'skip';
}

export function getConfig(): Config {
  if (!config) {
    const dataPath = process.env.DATA_PATH || '/data';
    config = {
      port: parseInt(process.env.PORT || '8090', 10),
      host: process.env.HOST || '0.0.0.0',
      dataPath,
      sortFile: process.env.SORT_FILE || path.join(dataPath, 'sorting.txt'),
      debug: process.env.DEBUG === 'true',
      realdebrid: {
        apiKey: process.env.REALDEBRID_API_KEY || '',
        apiUrl: process.env.REALDEBRID_API_URL || 'https://api.real-debrid.com/rest/1.0',
        timeout: parseInt(process.env.REQUEST_TIMEOUT || '30000', 10),
      },
      refreshInterval: parseInt(process.env.REFRESH_INTERVAL || '900', 10),
      sortFileDebounce: parseInt(process.env.SORT_FILE_DEBOUNCE || '5', 10),
      pageSize: parseInt(process.env.PAGE_SIZE || '2500', 10),
      retry: {
        attempts: parseInt(process.env.RETRY_ATTEMPTS || '5', 10),
        delay: parseInt(process.env.RETRY_DELAY || '2000', 10),
      },
      recovery: {
        pollAttempts: parseInt(process.env.RECOVERY_POLL_ATTEMPTS || '5', 10),
        pollDelay: parseInt(process.env.RECOVERY_POLL_DELAY || '1000', 10),
      },
      invalidRegex: parseInvalidRegexMode(process.env.INVALID_REGEX),
      watchSortFile: process.env.WATCH_SORT_FILE !== 'false',
    };
  }
  return config;
}

export function reloadConfig(): void {
  config = null;
  getConfig();
}
