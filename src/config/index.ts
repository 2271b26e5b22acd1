import dotenv from 'dotenv';
import { parseConfig } from './schema.js';
import type { AppConfig } from './schema.js';

dotenv.config();

export type { AppConfig } from './schema.js';

export const config: AppConfig = parseConfig(process.env);
