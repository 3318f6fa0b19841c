import { config } from 'dotenv';
import { AppConfig } from '../types/music';
import { loadAppConfig } from './schema';

// Load environment variables
config();

export const appConfig: AppConfig = loadAppConfig();

export { loadAppConfig } from './schema';
export { PluginConfig } from './pluginConfig';
