import dotenv from 'dotenv';
import { z } from 'zod';

// Load .env file into process.env
dotenv.config();

// Only the database location, for tools that never talk to Telegram
export const DatabaseEnvSchema = z.object({
  DATABASE_PATH: z.string().min(1).default('database.db'),
});

// Zod schema validates environment variables at runtime
// z.coerce.number() turns the ADMIN_ID string into a number before .int() checks it
const EnvSchema = DatabaseEnvSchema.extend({
  BOT_TOKEN: z.string().min(1),
  ADMIN_ID: z.coerce.number().int(),
  BOT_NAME: z.string().min(1),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).optional(),
});

export type Env = z.infer<typeof EnvSchema>;
export type DatabaseEnv = z.infer<typeof DatabaseEnvSchema>;

// Parse and validate the environment against the schema
// Throws ZodError if BOT_TOKEN, ADMIN_ID or BOT_NAME are missing, so the bot refuses to start
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.parse(source);
  return {
    ...parsed,
    // t.me links are built from the bare handle
    BOT_NAME: parsed.BOT_NAME.replace(/^@/, ''),
  };
}

export function loadDatabaseEnv(source: NodeJS.ProcessEnv = process.env): DatabaseEnv {
  return DatabaseEnvSchema.parse(source);
}
