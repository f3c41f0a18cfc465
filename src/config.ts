import { z } from 'zod';
import { Locale } from './modules/surveys/types';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(4000),
  DATABASE_URL: z.string().min(1).default('mongodb://127.0.0.1:27017/survey-intake'),
  CORS_ORIGINS: z.string().default('http://localhost:3000'),
  DEFAULT_LOCALE: z.enum(['mn', 'en']).default('mn'),
});

export type AppConfig = {
  nodeEnv: 'development' | 'test' | 'production';
  port: number;
  databaseUrl: string;
  corsOrigins: string[];
  defaultLocale: Locale;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration (${problems.join('; ')})`);
  }

  const { NODE_ENV, PORT, DATABASE_URL, CORS_ORIGINS, DEFAULT_LOCALE } = parsed.data;
  return {
    nodeEnv: NODE_ENV,
    port: PORT,
    databaseUrl: DATABASE_URL,
    corsOrigins: CORS_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter(Boolean),
    defaultLocale: DEFAULT_LOCALE,
  };
}
