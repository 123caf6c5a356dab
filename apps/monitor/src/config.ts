import { readFile } from 'node:fs/promises';

import type { ZodError } from 'zod';

import type { Env } from './env';
import { MonitorError, toErrorMessage } from './errors';
import { configFileSchema, type MonitorConfig } from './schemas/config';

function formatIssues(err: ZodError): string {
  return err.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    )
    .join('; ');
}

export function parseConfig(
  raw: unknown,
  overrides: Pick<Env, 'SERVICE_NAME' | 'BASE_URL'> = {},
): MonitorConfig {
  const merged =
    raw !== null && typeof raw === 'object' && !Array.isArray(raw)
      ? {
          ...raw,
          ...(overrides.SERVICE_NAME ? { service_name: overrides.SERVICE_NAME } : {}),
          ...(overrides.BASE_URL ? { base_url: overrides.BASE_URL } : {}),
        }
      : raw;

  const r = configFileSchema.safeParse(merged);
  if (!r.success) {
    throw new MonitorError('CONFIG_INVALID', `Invalid configuration: ${formatIssues(r.error)}`);
  }
  return r.data;
}

export async function loadConfig(
  path: string,
  overrides: Pick<Env, 'SERVICE_NAME' | 'BASE_URL'> = {},
): Promise<MonitorConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new MonitorError(
      'CONFIG_INVALID',
      `Cannot read configuration ${path}: ${toErrorMessage(err)}`,
      { cause: err },
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new MonitorError('CONFIG_INVALID', `Invalid JSON in ${path}: ${toErrorMessage(err)}`, {
      cause: err,
    });
  }

  return parseConfig(raw, overrides);
}
