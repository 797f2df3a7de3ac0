/**
 * Configuration type definitions
 */

export type RuntimeEnv = 'development' | 'production' | 'test';

export interface LoggingConfig {
  level: string;
  toFiles: boolean;
}

export interface DecoderConfig {
  /** Keep groups the decoder could not place in `_not_implemented` */
  recordSkippedGroups: boolean;
}

export interface EncoderConfig {
  /** Fallback for the 90-99 visibility band when a report carries no provenance */
  useVisibility90: boolean;
  /** Fallback for the 90-99 cloud height band when a report carries no provenance */
  useCloudHeight90: boolean;
}

export interface AppConfig {
  env: RuntimeEnv;
  logging: LoggingConfig;
  decoder: DecoderConfig;
  encoder: EncoderConfig;
}
