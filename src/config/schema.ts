import { z } from 'zod';

export const SpotifyConfigSchema = z.object({
  clientId: z.string(),
  clientSecret: z.string(),
  market: z.string().length(2, 'Spotify market must be a two-letter country code'),
  requestTimeoutMs: z.number().int().min(1000, 'Request timeout must be at least 1000ms'),
});

export const RateLimitConfigSchema = z.object({
  minTime: z.number().min(0),
  maxConcurrent: z.number().min(1),
});

export const RetryConfigSchema = z.object({
  maxAttempts: z.number().int().min(1, 'At least one attempt is required'),
  baseDelayMs: z.number().min(0),
  maxDelayMs: z.number().min(0),
});

// Endpoint limits: audio-features takes 100 ids, tracks and artists take 50.
export const BatchConfigSchema = z.object({
  audioFeatures: z.number().int().min(1).max(100),
  tracks: z.number().int().min(1).max(50),
  artists: z.number().int().min(1).max(50),
});

export const PathsConfigSchema = z.object({
  input: z.string().min(1, 'Input directory is required'),
  output: z.string().min(1, 'Output directory is required'),
  temp: z.string().min(1, 'Temp directory is required'),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['error', 'warn', 'info', 'debug']),
});

export const AppConfigSchema = z.object({
  spotify: SpotifyConfigSchema,
  rateLimit: z.object({
    spotify: RateLimitConfigSchema,
  }),
  retry: RetryConfigSchema,
  batch: BatchConfigSchema,
  paths: PathsConfigSchema,
  logging: LoggingConfigSchema,
});

export type ValidatedAppConfig = z.infer<typeof AppConfigSchema>;
