import { z } from 'zod';

// Helpers for TEXT columns holding JSON. Values are validated when written and when read.

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function parseDbJson<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: string,
  opts: { field?: string } = {},
): T {
  const field = opts.field ?? 'json';

  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (err) {
    throw new Error(`Invalid JSON in ${field}: ${describeError(err)}`);
  }

  const r = schema.safeParse(parsed);
  if (!r.success) {
    throw new Error(`Invalid value in ${field}: ${r.error.message}`);
  }
  return r.data;
}

export function serializeDbJson<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: T,
  opts: { field?: string } = {},
): string {
  const r = schema.safeParse(value);
  if (!r.success) {
    const field = opts.field ?? 'json';
    throw new Error(`Invalid value in ${field}: ${r.error.message}`);
  }
  return JSON.stringify(r.data);
}

export const MAX_INCIDENT_REASONS = 32;
export const MAX_INCIDENT_REASON_LENGTH = 2_000;

// Failure reasons recorded when an incident opens, e.g. "GET Timeout after 10000ms".
export const incidentReasonsJsonSchema = z
  .array(z.string().max(MAX_INCIDENT_REASON_LENGTH))
  .max(MAX_INCIDENT_REASONS);
