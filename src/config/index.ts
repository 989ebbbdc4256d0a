import dotenv from 'dotenv';
import { AppConfigSchema, type ValidatedAppConfig } from './schema.js';
import { ConfigurationError } from '../types/errors.js';

dotenv.config();

function createConfig(): ValidatedAppConfig {
  const rawConfig = {
    spotify: {
      clientId: process.env.SPOTIFY_CLIENT_ID || '',
      clientSecret: process.env.SPOTIFY_CLIENT_SECRET || '',
      market: process.env.SPOTIFY_MARKET || 'GB',
      requestTimeoutMs: parseInt(process.env.SPOTIFY_REQUEST_TIMEOUT_MS || '30000', 10),
    },
    rateLimit: {
      spotify: {
        minTime: parseInt(process.env.SPOTIFY_RATE_LIMIT_MIN_TIME || '100', 10),
        maxConcurrent: parseInt(process.env.SPOTIFY_RATE_LIMIT_MAX_CONCURRENT || '1', 10),
      },
    },
    retry: {
      maxAttempts: parseInt(process.env.RETRY_MAX_ATTEMPTS || '4', 10),
      baseDelayMs: parseInt(process.env.RETRY_BASE_DELAY_MS || '1000', 10),
      maxDelayMs: parseInt(process.env.RETRY_MAX_DELAY_MS || '30000', 10),
    },
    batch: {
      audioFeatures: parseInt(process.env.BATCH_SIZE_AUDIO_FEATURES || '100', 10),
      tracks: parseInt(process.env.BATCH_SIZE_TRACKS || '50', 10),
      artists: parseInt(process.env.BATCH_SIZE_ARTISTS || '50', 10),
    },
    paths: {
      input: process.env.INPUT_DIR || './input',
      output: process.env.OUTPUT_DIR || './output',
      temp: process.env.TEMP_DIR || './temp',
    },
    logging: {
      level: process.env.LOG_LEVEL || 'info',
    },
  };

  const result = AppConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration: ${result.error.message}`, {
      issues: result.error.issues,
    });
  }
  return result.data;
}

export const config = createConfig();

export function validateEnvironment(): string[] {
  const requiredEnvVars = ['SPOTIFY_CLIENT_ID', 'SPOTIFY_CLIENT_SECRET'];

  return requiredEnvVars.filter((envVar) => !process.env[envVar]);
}

export function printConfigSummary(): void {
  console.log('Configuration Summary:');
  console.log(`- Market: ${config.spotify.market}`);
  console.log(`- Input: ${config.paths.input}`);
  console.log(`- Output: ${config.paths.output}`);
  console.log(`- Temp: ${config.paths.temp}`);
  console.log(`- Log Level: ${config.logging.level}`);
  console.log(`- Retry: ${config.retry.maxAttempts} attempts, ${config.retry.baseDelayMs}ms base delay`);
}
