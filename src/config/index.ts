import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import type { AppConfig, RuntimeEnv } from '../types/config.types';

const rootEnvPath = path.resolve(__dirname, '../../.env');
if (fs.existsSync(rootEnvPath)) {
  dotenv.config({ path: rootEnvPath });
}

dotenv.config();

const parseEnv = (value: string | undefined): RuntimeEnv => {
  if (value === 'production' || value === 'test') {
    return value;
  }
  return 'development';
};

const resolveBooleanFlag = (
  enableKey: string | undefined,
  disableKey: string | undefined,
  defaultValue: boolean,
): boolean => {
  if (enableKey !== undefined) {
    return enableKey === 'true';
  }
  if (disableKey !== undefined) {
    return disableKey !== 'true';
  }
  return defaultValue;
};

const useVisibility90 = resolveBooleanFlag(
  process.env.SYNOP_USE_VISIBILITY_90,
  process.env.SYNOP_DISABLE_VISIBILITY_90,
  false,
);

const useCloudHeight90 = resolveBooleanFlag(
  process.env.SYNOP_USE_CLOUD_HEIGHT_90,
  process.env.SYNOP_DISABLE_CLOUD_HEIGHT_90,
  false,
);

const recordSkippedGroups = resolveBooleanFlag(
  process.env.SYNOP_RECORD_SKIPPED_GROUPS,
  undefined,
  true,
);

const config: AppConfig = {
  env: parseEnv(process.env.NODE_ENV),
  logging: {
    level: process.env.LOG_LEVEL || 'info',
    toFiles: process.env.LOG_TO_FILES === 'true',
  },
  decoder: {
    recordSkippedGroups,
  },
  encoder: {
    useVisibility90,
    useCloudHeight90,
  },
};

export { resolveBooleanFlag };
export default config;
