import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(3000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // CORS: comma-separated origins, all allowed when unset
  ALLOWED_ORIGINS: z.string().optional(),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),

  // JSON array of records loaded into the store at startup
  RECORDS_FILE: z.string().optional(),

  // Matching defaults (requests may override per call)
  MATCH_MIN_RELEVANCE: z.coerce.number().min(0).max(1).default(0.1),
  MATCH_MAX_RESULTS: z.coerce.number().int().min(1).default(10),
  MATCH_MAX_EDIT_DISTANCE: z.coerce.number().int().min(0).default(2),

  // Deep links returned with results: <scheme>://medication/<id>
  DEEP_LINK_SCHEME: z.string().regex(/^[a-z][a-z0-9+.-]*$/).default('pillsight'),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function parseConfig(env: NodeJS.ProcessEnv) {
  return envSchema.safeParse(env);
}

function loadConfig(): EnvConfig {
  const result = parseConfig(process.env);

  if (!result.success) {
    console.error('Invalid environment configuration:');
    console.error(result.error.format());
    process.exit(1);
  }

  return result.data;
}

export const config = loadConfig();

export default config;
