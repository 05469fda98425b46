import { z } from 'zod';

const loggingSchema = z.object({
  DEBUG: z
    .string()
    .optional()
    .transform((value) => value === 'true'),
  LOG_DIR: z
    .string()
    .optional()
    .transform((value) => value || undefined),
});

const envSchema = loggingSchema.extend({
  DB_PATH: z.string().min(1).default('./data/library-panels.sqlite'),
});

export type LoggingConfig = {
  debug: boolean;
  logDir?: string;
};

export type AppConfig = LoggingConfig & {
  dbPath: string;
};

function parseEnv<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, env: NodeJS.ProcessEnv): T {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }
  return parsed.data;
}

/** Reads only what the logger needs, so importing it never depends on DB_PATH. */
export function loadLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const data = parseEnv(loggingSchema, env);
  return { debug: data.DEBUG, logDir: data.LOG_DIR };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const data = parseEnv(envSchema, env);
  return {
    dbPath: data.DB_PATH,
    debug: data.DEBUG,
    logDir: data.LOG_DIR,
  };
}
