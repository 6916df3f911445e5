import { z } from 'zod';

const flag = z
  .string()
  .optional()
  .transform(v => v === 'true' || v === '1');

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(4000),
  HOST: z.string().default('0.0.0.0'),
  ORIGIN: z.string().default(''),
  DATABASE_PATH: z.string().min(1).default('./data/tallybook.db'),
  APP_DEBUG: flag,
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type AppConfig = {
  port: number;
  host: string;
  origins: string[];
  databasePath: string;
  debug: boolean;
  testing: boolean;
  logLevel: z.infer<typeof EnvSchema>['LOG_LEVEL'];
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.parse(env);
  return {
    port: parsed.PORT,
    host: parsed.HOST,
    origins: parsed.ORIGIN.split(',').map(s => s.trim()).filter(Boolean),
    databasePath: parsed.DATABASE_PATH,
    debug: parsed.APP_DEBUG,
    testing: parsed.NODE_ENV === 'test',
    logLevel: parsed.LOG_LEVEL,
  };
}
