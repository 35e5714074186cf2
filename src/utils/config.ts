import { config as dotenvConfig } from 'dotenv';
import type { Config, LogLevel } from '../types/index.js';

dotenvConfig();

type Env = Record<string, string | undefined>;

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Raised when required settings are missing or malformed.
 * Fatal: reported to the caller before any browser or oracle traffic.
 */
export class ConfigError extends Error {
  constructor(public readonly keys: string[], detail: string) {
    super(`${detail}: ${keys.join(', ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Build the runtime configuration from environment variables
 * @param env - Defaults to process.env (after .env has been loaded)
 */
export function loadConfig(env: Env = process.env): Config {
  const missing: string[] = [];
  const invalid: string[] = [];

  function getEnvVar(key: string, required = true): string {
    const value = env[key]?.trim();
    if (required && !value) {
      missing.push(key);
    }
    return value || '';
  }

  function getNumber(key: string, fallback: number, integer = false): number {
    const raw = getEnvVar(key, false);
    if (!raw) return fallback;
    const parsed = Number(raw);
    if (!Number.isFinite(parsed) || parsed < 0 || (integer && !Number.isInteger(parsed))) {
      invalid.push(key);
      return fallback;
    }
    return parsed;
  }

  const wsEndpoint = getEnvVar('BROWSER_WS_ENDPOINT', false);
  const executablePath = getEnvVar('CHROME_EXECUTABLE_PATH', false);
  if (!wsEndpoint && !executablePath) {
    missing.push('BROWSER_WS_ENDPOINT or CHROME_EXECUTABLE_PATH');
  }

  const logLevelRaw = getEnvVar('LOG_LEVEL', false) || 'info';
  const logLevel = LOG_LEVELS.find((level) => level === logLevelRaw);
  if (!logLevel) {
    invalid.push('LOG_LEVEL');
  }

  const config: Config = {
    gemini: {
      apiKey: getEnvVar('GEMINI_API_KEY'),
      model: getEnvVar('GEMINI_MODEL', false) || 'gemini-2.0-flash',
      minIntervalMs: getNumber('GEMINI_MIN_INTERVAL_MS', 0),
    },
    browser: {
      wsEndpoint: wsEndpoint || undefined,
      executablePath: executablePath || undefined,
      settleDelayMs: getNumber('PAGE_SETTLE_DELAY_MS', 3000),
      navigationTimeoutMs: getNumber('NAVIGATION_TIMEOUT_MS', 60000),
    },
    crawl: {
      maxDepth: getNumber('CRAWL_MAX_DEPTH', 2, true),
      maxLinksPerPage: getNumber('CRAWL_MAX_LINKS_PER_PAGE', 50, true),
    },
    output: {
      directory: getEnvVar('OUTPUT_DIR', false) || 'rep_firm_data',
    },
    app: {
      logLevel: logLevel ?? 'info',
    },
  };

  if (missing.length > 0) {
    throw new ConfigError(missing, 'Missing required environment variables');
  }
  if (invalid.length > 0) {
    throw new ConfigError(invalid, 'Invalid environment variables');
  }

  return config;
}
