// Configuration
import dotenv from 'dotenv';
import { parseConfig, type Config } from './schema.js';

dotenv.config();

export { ConfigSchema, parseConfig, buildRawConfig, type Config, type ConfigResult } from './schema.js';

function loadConfig(): Config {
  const result = parseConfig(process.env);

  if (!result.success) {
    console.error('Configuration validation failed:');
    result.issues.forEach((issue) => {
      console.error(`  - ${issue}`);
    });
    process.exit(1);
  }

  return result.config;
}

export const config = loadConfig();
