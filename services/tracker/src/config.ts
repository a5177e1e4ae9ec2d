/**
 * Service configuration
 * Parsed from environment variables with defaults
 */

import { z } from 'zod';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(8080),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  SERVICE_NAME: z.string().min(1).default('tracker'),
  LOCAL_STORE_PATH: z.string().min(1).default('.data/local-store.json'),
  REMINDER_FOLLOWUP_OFFSET_HOURS: z.coerce.number().int().min(1).max(12).default(2),
  REMINDER_GRACE_PERIOD_MINUTES: z.coerce.number().int().min(0).max(120).default(30),
  REMINDER_SNOOZE_MINUTES: z.coerce.number().int().min(1).max(240).default(15),
});

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
  logLevel: string;
  serviceName: string;
  localStorePath: string;
  reminders: {
    followupOffsetHours: number;
    gracePeriodMinutes: number;
    snoozeMinutes: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  return Object.freeze({
    nodeEnv: values.NODE_ENV,
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    serviceName: values.SERVICE_NAME,
    localStorePath: values.LOCAL_STORE_PATH,
    reminders: Object.freeze({
      followupOffsetHours: values.REMINDER_FOLLOWUP_OFFSET_HOURS,
      gracePeriodMinutes: values.REMINDER_GRACE_PERIOD_MINUTES,
      snoozeMinutes: values.REMINDER_SNOOZE_MINUTES,
    }),
  });
}

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}
