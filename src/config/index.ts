/**
 * Configuration settings for the topology collector
 */
import { config } from 'dotenv';

// Load environment variables from .env file if present
config();

// Environment mapping for log levels
const LOG_LEVELS = {
  development: 'debug',
  test: 'debug',
  production: 'info',
} as const;

type NodeEnv = keyof typeof LOG_LEVELS;

function isNodeEnv(value: string): value is NodeEnv {
  return value in LOG_LEVELS;
}

const rawEnv = process.env.NODE_ENV || 'development';
const nodeEnv: NodeEnv = isNodeEnv(rawEnv) ? rawEnv : 'development';

// Integer from the environment, or the default when unset or not a number
function envInt(name: string, fallback: number): number {
  const value = parseInt(process.env[name] || '', 10);
  return Number.isFinite(value) ? value : fallback;
}

/**
 * Configuration object for the topology collector
 */
export const Config = {
  // Service info
  service: {
    name: 'topology-collector',
    version: process.env.npm_package_version || '0.1.0',
  },

  // Logging configuration
  logging: {
    level: process.env.LOG_LEVEL || LOG_LEVELS[nodeEnv],
    prettyPrint: nodeEnv !== 'production',
  },

  // Report collection
  collector: {
    // Reports older than this are dropped from the merged view
    windowMs: envInt('COLLECTOR_WINDOW_MS', 15000),
    // Upper bound on reports held at once; oldest are evicted first
    maxReports: envInt('COLLECTOR_MAX_REPORTS', 10000),
  },
};

export { envInt };

export type CollectorConfig = typeof Config.collector;

// Export configuration as default
export default Config;
