import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

dotenv.config({ path: path.resolve(process.cwd(), '.env') });

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const SettingsSchema = z.object({
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default('127.0.0.1'),
  DATA_DIR: z.string().default('data'),
  ENGINE_CONFIG_FILE: z.string().optional(),
  BROWSER_TYPE: z.enum(['chrome', 'dolphin']).default('chrome'),
  HEADLESS: booleanFlag.default('false'),
  CHROME_EXECUTABLE_PATH: z.string().optional(),
  DOLPHIN_API_URL: z.string().url().default('http://localhost:3001/v1.0'),
  DOLPHIN_TOKEN: z.string().optional(),
});

export type Settings = z.infer<typeof SettingsSchema>;

let settings: Settings | null = null;

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const result = SettingsSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration: ${issues.join('; ')}`);
  }
  return result.data;
}

export function getSettings(): Settings {
  if (!settings) {
    settings = loadSettings();
  }
  return settings;
}
