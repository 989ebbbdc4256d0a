export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface BatchConfig {
  audioFeatures: number;
  tracks: number;
  artists: number;
}

export interface CLIOptions {
  input?: string;
  output?: string;
  temp?: string;
  market?: string;
  features?: boolean;
  artistInfo?: boolean;
  verbose?: boolean;
}
