import { z } from 'zod';

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v.trim() : undefined));

export const envSchema = z.object({
  KEEPWATCH_CONFIG: z.string().min(1).default('./keepwatch.config.json'),
  KEEPWATCH_DB: z.string().min(1).default('./data/keepwatch.db'),
  KEEPWATCH_CRON_TOKEN: optionalString,
  PORT: z.coerce.number().int().min(1).max(65_535).default(8787),
  SERVICE_NAME: optionalString,
  BASE_URL: optionalString,
});

export type Env = z.infer<typeof envSchema>;

export function readEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return envSchema.parse(source);
}
